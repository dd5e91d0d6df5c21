export { collectHistory, type HistoryEntry, type RunHistory } from './run-history'
export { CLIReporter, type CLIReporterOptions, JSONReporter, type JSONReporterOptions } from './reporters'
