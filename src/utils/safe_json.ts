/**
 * @fileoverview Safe JSON Parsing
 *
 * Stored rows carry JSON columns written by earlier versions or by hand;
 * reads must never throw on them.
 *
 * @packageDocumentation
 */

import { Err, Ok, type Result } from '../core/result.js';
import { toError } from './errors.js';

/**
 * Parse JSON into an unknown value wrapped in a Result.
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(text));
  } catch (e) {
    return Err(toError(e));
  }
}

/**
 * Parse a JSON object column. Anything that is not a plain object yields `fallback`.
 */
export function parseJsonObject(
  text: string | null | undefined,
  fallback: Record<string, unknown> = {}
): Record<string, unknown> {
  if (!text) return fallback;
  const parsed = safeJsonParse(text);
  if (!parsed.ok) return fallback;
  const value = parsed.value;
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return fallback;
  return Object.fromEntries(Object.entries(value));
}
