/**
 * @fileoverview CLI dispatcher
 *
 * Parses global and command flags in one pass, resolves the configuration,
 * opens the engine for the duration of one command and maps failures onto
 * exit codes. Returns the exit code instead of exiting.
 */

import { parseArgs } from 'node:util';
import {
  loadEngineConfigFile,
  resolveEngineConfig,
  type EngineConfigOverrides,
  type EnvSource,
} from '../config/index.js';
import { createDecisionEngine } from '../orchestrator/create_engine.js';
import { setLogLevel } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { pruneCommand } from './commands/prune.js';
import { recordCommand } from './commands/record.js';
import { resetValuesCommand } from './commands/reset_values.js';
import type { CommandOptions } from './commands/shared.js';
import { statsCommand } from './commands/stats.js';
import { suggestCommand } from './commands/suggest.js';
import { workflowCommand } from './commands/workflow.js';
import { classifyError, createError, formatError, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'stats' | 'prune' | 'suggest' | 'record' | 'workflow' | 'reset-values';

const COMMANDS: Record<Command, (options: CommandOptions) => Promise<void>> = {
  stats: statsCommand,
  prune: pruneCommand,
  suggest: suggestCommand,
  record: recordCommand,
  workflow: workflowCommand,
  'reset-values': resetValuesCommand,
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export interface RunCliOptions {
  /** Source of ACTION_ENGINE_* variables (default process.env) */
  env?: EnvSource;
}

function parseCliArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        json: { type: 'boolean', default: false },
        db: { type: 'string' },
        config: { type: 'string' },
        days: { type: 'string' },
        actions: { type: 'string' },
        text: { type: 'string' },
        outcome: { type: 'string' },
        min: { type: 'string' },
        limit: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  try {
    const { values, positionals } = parseCliArgs(args);
    const [command, ...commandArgs] = positionals;

    if (values.version) {
      const { VERSION } = await import('../index.js');
      console.log(`action-engine ${VERSION}`);
      return 0;
    }
    if (values.help || !command || command === 'help') {
      showHelp(command === 'help' ? commandArgs[0] : command);
      return 0;
    }
    if (!isCommand(command)) {
      throw createError('UNKNOWN_COMMAND', `Unknown command: ${command}`, { command });
    }

    const file = values.config ? await loadEngineConfigFile(values.config) : undefined;
    const overrides: EngineConfigOverrides = values.db ? { dbPath: values.db } : {};
    const config = resolveEngineConfig(overrides, { file, env: options.env ?? process.env });
    setLogLevel(config.logLevel);

    const engine = await createDecisionEngine({ config });
    try {
      await COMMANDS[command]({
        engine,
        args: commandArgs,
        flags: {
          days: values.days,
          actions: values.actions,
          text: values.text,
          outcome: values.outcome,
          min: values.min,
          limit: values.limit,
        },
        json: values.json,
      });
    } finally {
      await engine.close();
    }
    return 0;
  } catch (error) {
    const classified = classifyError(error);
    console.error(formatError(classified));
    return getExitCode(classified);
  }
}
