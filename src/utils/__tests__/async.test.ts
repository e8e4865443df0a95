import { describe, it, expect } from 'vitest';
import { AbortError, TimeoutError, createDeadlineSignal, withTimeout } from '../async.js';

const never = (): Promise<string> => new Promise(() => undefined);

describe('withTimeout', () => {
  it('resolves with the value when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('rejects with TimeoutError after the limit', async () => {
    await expect(withTimeout(never(), 10, { context: 'embedding' })).rejects.toThrow(
      new TimeoutError(10, 'embedding')
    );
  });

  it('rejects with AbortError when the signal fires', async () => {
    const controller = new AbortController();
    const pending = withTimeout(never(), undefined, { signal: controller.signal, context: 'knn' });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(withTimeout(Promise.resolve(1), 1000, { signal: controller.signal })).rejects.toThrow(
      'Aborted'
    );
  });
});

describe('createDeadlineSignal', () => {
  it('aborts once the deadline passes', async () => {
    const deadline = createDeadlineSignal(10);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(TimeoutError);
    deadline.dispose();
  });

  it('follows the parent signal', () => {
    const parent = new AbortController();
    const deadline = createDeadlineSignal(0, parent.signal);
    expect(deadline.signal.aborted).toBe(false);
    parent.abort();
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });
});
