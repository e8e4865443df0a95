import { formatPercent, printJson, printKeyValue, printTable } from '../output.js';
import { parsePositiveInt, type CommandOptions } from './shared.js';

export async function statsCommand(options: CommandOptions): Promise<void> {
  const { engine, flags, json } = options;
  const limit = parsePositiveInt(flags.limit, '--limit') ?? 5;

  const [stats, topSituations, topValues] = await Promise.all([
    engine.orchestrator.getCombinedStats(),
    engine.store.topSituations(limit),
    engine.store.topValues(limit),
  ]);

  if (json) {
    printJson({ ...stats, topSituations, topValues });
    return;
  }

  console.log('Action Engine Statistics');
  console.log('========================\n');

  console.log('History:');
  const history = stats.knn;
  printKeyValue([
    { key: 'Actions', value: history?.totalActions ?? null },
    { key: 'Situations', value: history?.uniqueSituations ?? null },
    { key: 'Distinct actions', value: history?.uniqueActions ?? null },
    { key: 'Success rate', value: history ? formatPercent(history.successRate) : null },
  ]);
  console.log();

  console.log('Learners:');
  printKeyValue([
    { key: 'Learned values', value: stats.reinforcement?.totalValues ?? null },
    { key: 'Exemplars', value: stats.fewShot?.totalExamples ?? null },
    { key: 'Transfers', value: stats.meta?.totalTransfers ?? null },
  ]);

  if (topSituations.length > 0) {
    console.log('\nTop situations:');
    printTable(
      ['Situation', 'Count'],
      topSituations.map((entry) => [entry.situation, String(entry.count)])
    );
  }

  if (topValues.length > 0) {
    console.log('\nTop values:');
    printTable(
      ['State', 'Action', 'Value', 'Updates'],
      topValues.map((entry) => [entry.stateHash, entry.action, entry.value.toFixed(3), String(entry.updateCount)])
    );
  }
}
