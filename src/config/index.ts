/**
 * @fileoverview Engine configuration
 *
 * Values resolve in layers: built-in defaults, then an optional YAML file,
 * then `ACTION_ENGINE_*` environment variables, then explicit overrides.
 * The merged result is validated once; any invalid field raises a
 * `ConfigError` listing every issue.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().min(1);

const ReinforcementSchema = z.object({
  learningRate: z.number().gt(0).max(1),
  discount: unit,
  epsilon: unit,
});

const FewShotSchema = z.object({
  threshold: unit,
  embedTimeoutMs: z.number().int().min(0),
});

const MetaSchema = z.object({
  similarityThreshold: unit,
  minSourceSuccesses: positiveInt,
});

const KnnSchema = z.object({
  k: positiveInt,
  minConfidence: unit,
  minSamples: positiveInt,
});

const ActiveSchema = z.object({
  uncertaintyThreshold: unit,
  maxOptions: positiveInt,
});

const GatesSchema = z.object({
  reinforcement: unit,
  fewShot: unit,
  meta: unit,
  knn: unit,
});

const EmbeddingSchema = z.object({
  url: z.string().url().nullable(),
  model: z.string().min(1),
});

export const EngineConfigSchema = z.object({
  dbPath: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  retentionDays: positiveInt,
  decisionDeadlineMs: z.number().int().min(0),
  reinforcement: ReinforcementSchema,
  fewShot: FewShotSchema,
  meta: MetaSchema,
  knn: KnnSchema,
  active: ActiveSchema,
  gates: GatesSchema,
  embedding: EmbeddingSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const EngineConfigOverridesSchema = EngineConfigSchema.deepPartial().strict();

/** Any subset of the config; nested sections may be partial too */
export type EngineConfigOverrides = z.infer<typeof EngineConfigOverridesSchema>;

export const DEFAULT_DB_PATH = path.join(os.homedir(), '.action-engine', 'learning.db');

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  dbPath: DEFAULT_DB_PATH,
  logLevel: 'info',
  retentionDays: 90,
  decisionDeadlineMs: 5000,
  reinforcement: { learningRate: 0.1, discount: 0.9, epsilon: 0.2 },
  fewShot: { threshold: 0.75, embedTimeoutMs: 2000 },
  meta: { similarityThreshold: 0.7, minSourceSuccesses: 3 },
  knn: { k: 10, minConfidence: 0.7, minSamples: 3 },
  active: { uncertaintyThreshold: 0.6, maxOptions: 3 },
  gates: { reinforcement: 0.8, fewShot: 0.75, meta: 0.7, knn: 0.7 },
  embedding: { url: null, model: 'nomic-embed-text' },
};

// ============================================================================
// MERGING
// ============================================================================

function mergeSection<T extends object>(base: T, patch: Partial<T> | undefined): T {
  const merged = { ...base };
  if (!patch) return merged;
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

export function mergeEngineConfig(base: EngineConfig, overrides: EngineConfigOverrides): EngineConfig {
  return {
    dbPath: overrides.dbPath ?? base.dbPath,
    logLevel: overrides.logLevel ?? base.logLevel,
    retentionDays: overrides.retentionDays ?? base.retentionDays,
    decisionDeadlineMs: overrides.decisionDeadlineMs ?? base.decisionDeadlineMs,
    reinforcement: mergeSection(base.reinforcement, overrides.reinforcement),
    fewShot: mergeSection(base.fewShot, overrides.fewShot),
    meta: mergeSection(base.meta, overrides.meta),
    knn: mergeSection(base.knn, overrides.knn),
    active: mergeSection(base.active, overrides.active),
    gates: mergeSection(base.gates, overrides.gates),
    embedding: mergeSection(base.embedding, overrides.embedding),
  };
}

// ============================================================================
// SOURCES
// ============================================================================

export type EnvSource = Record<string, string | undefined>;

const readNumber = (env: EnvSource, name: string): number | undefined => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
};

const readString = (env: EnvSource, name: string): string | undefined => {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
};

/**
 * Overrides taken from `ACTION_ENGINE_*` variables. Numbers that do not
 * parse become NaN and fail validation in `resolveEngineConfig`.
 */
export function configFromEnv(env: EnvSource): EngineConfigOverrides {
  const logLevel = readString(env, 'ACTION_ENGINE_LOG_LEVEL');
  const parsedLevel = logLevel === undefined ? undefined : EngineConfigSchema.shape.logLevel.safeParse(logLevel);
  if (parsedLevel && !parsedLevel.success) {
    throw new ConfigError('Invalid environment configuration', [`ACTION_ENGINE_LOG_LEVEL: unknown level '${logLevel}'`]);
  }
  return {
    dbPath: readString(env, 'ACTION_ENGINE_DB_PATH'),
    logLevel: parsedLevel?.data,
    retentionDays: readNumber(env, 'ACTION_ENGINE_RETENTION_DAYS'),
    decisionDeadlineMs: readNumber(env, 'ACTION_ENGINE_DECISION_DEADLINE_MS'),
    reinforcement: { epsilon: readNumber(env, 'ACTION_ENGINE_EPSILON') },
    embedding: {
      url: readString(env, 'ACTION_ENGINE_EMBEDDING_URL'),
      model: readString(env, 'ACTION_ENGINE_EMBEDDING_MODEL'),
    },
  };
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);

/** Validate a parsed document (for example a YAML file) as overrides. */
export function parseEngineConfigOverrides(value: unknown, source = 'config'): EngineConfigOverrides {
  const parsed = EngineConfigOverridesSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function loadEngineConfigFile(filePath: string): Promise<EngineConfigOverrides> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [getErrorMessage(error)]);
  }
  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${filePath}`, [getErrorMessage(error)]);
  }
  return parseEngineConfigOverrides(document, `config file ${filePath}`);
}

export interface ResolveConfigOptions {
  /** Layer applied between the defaults and the environment */
  file?: EngineConfigOverrides;
  env?: EnvSource;
}

/**
 * Resolve the effective configuration. Precedence, lowest first: defaults,
 * `options.file`, environment, `overrides`.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  options: ResolveConfigOptions = {}
): EngineConfig {
  const env = options.env ?? process.env;
  let merged = DEFAULT_ENGINE_CONFIG;
  if (options.file) merged = mergeEngineConfig(merged, options.file);
  merged = mergeEngineConfig(merged, configFromEnv(env));
  merged = mergeEngineConfig(merged, overrides);

  const validated = EngineConfigSchema.safeParse(merged);
  if (!validated.success) {
    throw new ConfigError('Invalid engine configuration', formatIssues(validated.error));
  }
  return validated.data;
}
