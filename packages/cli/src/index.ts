/**
 * @cmdfor/cli — Selector UI, cost ledger and the session loop
 */

export { runSession, MESSAGES, EXIT_OK, EXIT_FAILURE } from "./orchestrator.js";
export type { SessionDeps, CommandSource, CommandInjector } from "./orchestrator.js";
export { CommandSelector, selectCommand } from "./selector.js";
export {
  selectorReducer,
  initialSelectorState,
  formatCommandRows,
  type SelectorState,
  type SelectorAction,
} from "./state.js";
export { resolveKey, KEY_HELP, type SelectorKeyAction, type KeyFlags } from "./keymap.js";
export { Spinner, InkProgress, type Progress } from "./spinner.js";
export { CostTable, costRows, formatUsd, type CostRow } from "./cost-table.js";
export { CostLedger, LedgerError, formatDay, type CostRecorder, type DailyCosts } from "./ledger.js";
export { AnsiScreen, type Screen } from "./screen.js";
export { StderrReporter, type Reporter } from "./reporter.js";
export { loadConfig, type CliConfig } from "./config.js";
export { parseArgs, HELP_TEXT, type CliCommand } from "./args.js";
export { VERSION } from "./version.js";
