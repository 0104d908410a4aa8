/**
 * @contractcheck/cli
 *
 * The Commander program plus the process-free command cores and formatters,
 * for embedding contractcheck in another tool.
 */

export { program } from './commands/index.js'
export {
  EXIT_INPUT_ERROR,
  EXIT_OK,
  EXIT_REJECTED,
  applyConfigChange,
  exitCodeFor,
  parseLimit,
  parseOutcome,
  readManifestFiles,
  runCheck,
  toInputError,
} from './runtime.js'
export type {
  CheckRun,
  CheckRunOptions,
  InputError,
  ManifestFiles,
  ManifestSource,
  OptionResult,
} from './runtime.js'
export {
  formatBuiltInList,
  formatConfig,
  formatDiagnostic,
  formatInputError,
  formatLogEvent,
  formatLogEvents,
  formatUnitReport,
  unitReportToJson,
} from './output/report.js'
export { chalkTheme, plainTheme } from './output/theme.js'
export type { Paint, Theme } from './output/theme.js'
