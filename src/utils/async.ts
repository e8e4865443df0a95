/**
 * @fileoverview Async Utilities
 *
 * Timeout and cancellation helpers used to keep a slow collaborator (the
 * embedding provider) from stalling a decision cycle.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Custom error code to attach to timeout errors */
  errorCode?: string;
  /** Rejects early with an AbortError when this signal fires */
  signal?: AbortSignal;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly code?: string;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string, errorCode?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.code = errorCode;
  }
}

/**
 * Error thrown when the caller's abort signal fires first.
 */
export class AbortError extends Error {
  constructor(context?: string) {
    super(context ? `Aborted: ${context}` : 'Operation aborted');
    this.name = 'AbortError';
  }
}

/**
 * Wrap a promise with a timeout and an optional abort signal.
 *
 * @param timeoutMs - if <= 0 or undefined, only the signal (if any) applies
 * @throws TimeoutError if the promise does not settle within timeoutMs
 * @throws AbortError if `options.signal` aborts first
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(provider.embed(text), 2000, { context: 'embedding utterance' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  const signal = options?.signal;
  const limitMs =
    typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : null;
  if (limitMs === null && !signal) {
    return promise;
  }
  if (signal?.aborted) {
    throw new AbortError(options?.context);
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let onAbort: (() => void) | null = null;

  try {
    const guards: Promise<T>[] = [promise];
    if (limitMs !== null) {
      guards.push(
        new Promise<T>((_, reject) => {
          timeoutId = setTimeout(() => {
            reject(new TimeoutError(limitMs, options?.context, options?.errorCode));
          }, limitMs);
        })
      );
    }
    if (signal) {
      guards.push(
        new Promise<T>((_, reject) => {
          onAbort = () => reject(new AbortError(options?.context));
          signal.addEventListener('abort', onAbort, { once: true });
        })
      );
    }
    return await Promise.race(guards);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Create a signal that aborts after `deadlineMs` or when `parent` aborts,
 * whichever comes first. Call `dispose` once the guarded work is done.
 */
export function createDeadlineSignal(
  deadlineMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else if (parent) {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }
  if (Number.isFinite(deadlineMs) && deadlineMs > 0) {
    timeoutId = setTimeout(() => controller.abort(new TimeoutError(deadlineMs, 'decision deadline')), deadlineMs);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timeoutId) clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
