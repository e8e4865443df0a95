import type { CommandOptions } from './shared.js';

export async function resetValuesCommand(options: CommandOptions): Promise<void> {
  const removed = await options.engine.reinforcement.reset();
  console.log(`Cleared ${removed} learned values`);
}
