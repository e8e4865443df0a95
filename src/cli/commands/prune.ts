import { parsePositiveInt, type CommandOptions } from './shared.js';

export async function pruneCommand(options: CommandOptions): Promise<void> {
  const { engine, flags } = options;
  const days = parsePositiveInt(flags.days, '--days') ?? engine.config.retentionDays;
  const removed = await engine.store.prune(days);
  console.log(`Pruned ${removed} records older than ${days} days`);
}
