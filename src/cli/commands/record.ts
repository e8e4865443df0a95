import { createContextProvider } from '../../context/context_snapshot.js';
import type { Outcome } from '../../types.js';
import { createError } from '../errors.js';
import { requireArg, type CommandOptions } from './shared.js';

const USAGE = 'action-engine record <situation> <action> [--outcome success|failure|canceled] [--text "..."]';

const OUTCOMES: readonly Outcome[] = ['success', 'failure', 'canceled'];

export function parseOutcome(raw: string | undefined): Outcome {
  if (raw === undefined) return 'success';
  const outcome = OUTCOMES.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!outcome) {
    throw createError('INVALID_ARGUMENT', `--outcome must be one of ${OUTCOMES.join(', ')}, got '${raw}'`);
  }
  return outcome;
}

export async function recordCommand(options: CommandOptions): Promise<void> {
  const { engine, args, flags } = options;
  const situation = requireArg(args, 0, 'situation', USAGE);
  const action = requireArg(args, 1, 'action', USAGE);
  const outcome = parseOutcome(flags.outcome);

  const context = createContextProvider().getCurrentContext({ situation });
  const report = await engine.orchestrator.learnFromOutcome(flags.text ?? null, situation, context, action, {}, outcome);
  if (!report.recorded) {
    throw createError('STORAGE_ERROR', `Could not record ${situation} -> ${action}`);
  }

  console.log(`Recorded ${outcome} for ${situation} -> ${action}`);
  if (report.exemplarStored) {
    console.log('Stored the phrasing as an exemplar');
  }
}
