/**
 * @settlekit/cli — Public API.
 */

export { runCli, VERSION } from "./cli.js";
export type { CliDeps } from "./cli.js";
export { runReplay, StrictModeError } from "./replay-runner.js";
export type {
  ReplayRunOptions,
  ReplaySummary,
  RejectionLogEntry,
} from "./replay-runner.js";
export { formatSummary } from "./summary.js";
export {
  ConfigSchema,
  CliOptionsSchema,
  loadConfig,
  resolveSettings,
} from "./config.js";
export type { AppConfig, CliOptions, ReplaySettings } from "./config.js";
