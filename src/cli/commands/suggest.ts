import { createContextProvider } from '../../context/context_snapshot.js';
import { createError } from '../errors.js';
import { formatPercent, printJson } from '../output.js';
import { requireArg, type CommandOptions } from './shared.js';

const USAGE = 'action-engine suggest <situation> --actions a,b,c [--text "..."]';

export function parseActionList(raw: string | undefined): string[] {
  const actions = (raw ?? '')
    .split(',')
    .map((action) => action.trim())
    .filter((action) => action.length > 0);
  if (actions.length === 0) {
    throw createError('INVALID_ARGUMENT', `--actions needs at least one action. Usage: ${USAGE}`);
  }
  return [...new Set(actions)];
}

export async function suggestCommand(options: CommandOptions): Promise<void> {
  const { engine, args, flags, json } = options;
  const situation = requireArg(args, 0, 'situation', USAGE);
  const candidates = parseActionList(flags.actions);

  const recent = await engine.store.recentActions(5);
  const context = createContextProvider().getCurrentContext({
    situation,
    recentActions: recent.map((entry) => entry.action).reverse(),
  });

  const decision = await engine.orchestrator.selectAction(situation, context, candidates, { userText: flags.text });
  if (!decision) {
    if (json) printJson(null);
    else console.log(`No suggestion for '${situation}' yet`);
    return;
  }

  const params = await engine.voter.optimizeParameters(decision.action, context, decision.params);
  if (json) {
    printJson({ ...decision, params });
    return;
  }

  console.log(`Suggested: ${decision.action} (${formatPercent(decision.confidence)}, ${decision.source})`);
  console.log(`Reason: ${decision.reason}`);
  if (Object.keys(params).length > 0) {
    console.log(`Params: ${JSON.stringify(params)}`);
  }
  if (decision.askUser) {
    const prompt = engine.orchestrator.formatDisambiguationPrompt(situation, decision.options ?? []);
    if (prompt) console.log(`\n${prompt}`);
  }
}
