import type { DecisionEngine } from '../../orchestrator/create_engine.js';
import { createError } from '../errors.js';

/** Command-specific flags; each command reads the ones it understands */
export interface CommandFlags {
  days?: string;
  actions?: string;
  text?: string;
  outcome?: string;
  min?: string;
  limit?: string;
}

export interface CommandOptions {
  engine: DecisionEngine;
  /** Positionals after the command name */
  args: string[];
  flags: CommandFlags;
  json: boolean;
}

export function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer, got '${raw}'`);
  }
  return value;
}

export function requireArg(args: string[], index: number, name: string, usage: string): string {
  const value = args[index]?.trim();
  if (!value) {
    throw createError('INVALID_ARGUMENT', `Missing <${name}>. Usage: ${usage}`);
  }
  return value;
}
