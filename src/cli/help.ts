/**
 * @fileoverview Help text for action-engine CLI commands
 */

const HELP_TEXT: Record<string, string> = {
  main: `
Action Engine CLI - inspect and maintain the adaptive action store

USAGE:
    action-engine <command> [options]

COMMANDS:
    stats               Show learner statistics, top situations and top values
    prune               Delete action records past the retention window
    suggest <situation> Run a decision for a situation
    record <situation> <action>
                        Learn from the outcome of an action
    workflow            Suggest the action that usually follows the last two
    reset-values        Clear the learned value table
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --db <path>         Database file (default: ~/.action-engine/learning.db)
    --config <file>     YAML config file
    --json              Print machine-readable JSON

ENVIRONMENT:
    ACTION_ENGINE_DB_PATH, ACTION_ENGINE_EPSILON, ACTION_ENGINE_LOG_LEVEL,
    ACTION_ENGINE_EMBEDDING_URL, ACTION_ENGINE_EMBEDDING_MODEL,
    ACTION_ENGINE_RETENTION_DAYS, ACTION_ENGINE_DECISION_DEADLINE_MS
`,
  stats: `
action-engine stats [--limit N] [--json]

Show combined statistics from every learner. --limit bounds the top
situations and top values tables (default 5).
`,
  prune: `
action-engine prune [--days N]

Delete action records older than N days (default: retentionDays from config).
`,
  suggest: `
action-engine suggest <situation> --actions a,b,c [--text "..."] [--json]

Run the strategies in priority order over the candidate actions. --text
enables the few-shot matcher when an embedding endpoint is configured.
`,
  record: `
action-engine record <situation> <action> [--outcome success|failure|canceled] [--text "..."]

Record an executed action and update the learners. The outcome defaults to
success; --text stores the phrasing as an exemplar on success.
`,
  workflow: `
action-engine workflow [--min N] [--json]

Look for the last two recorded actions in past sessions and report what
usually came next. --min is the number of matches required (default 5).
`,
  'reset-values': `
action-engine reset-values

Clear every learned value. Action history and exemplars are kept.
`,
};

export function getHelpText(command?: string): string {
  const text = command ? HELP_TEXT[command] : undefined;
  return (text ?? HELP_TEXT.main ?? '').trim();
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
