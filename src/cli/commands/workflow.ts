import { formatPercent, printJson } from '../output.js';
import { parsePositiveInt, type CommandOptions } from './shared.js';

export async function workflowCommand(options: CommandOptions): Promise<void> {
  const { engine, flags, json } = options;
  const minPatternCount = parsePositiveInt(flags.min, '--min');

  const recent = await engine.store.recentActions(2);
  const actions = recent.map((entry) => entry.action).reverse();
  const suggestion = await engine.voter.detectWorkflow(actions, minPatternCount);

  if (json) {
    printJson(suggestion);
    return;
  }
  if (!suggestion) {
    console.log('No recurring workflow detected');
    return;
  }
  console.log(
    `After ${suggestion.pattern.join(' -> ')} you usually do ${suggestion.nextAction} ` +
      `(${formatPercent(suggestion.confidence)}, ${suggestion.occurrences} times)`
  );
}
