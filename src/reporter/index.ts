export { RunReporter, type ReportOutcome } from './run-reporter.js';
export {
  FileReportSink,
  StorageReportSink,
  CallbackReportSink,
  type ReportSink,
} from './sinks.js';
export {
  buildSummary,
  renderMarkdown,
  statusForExecution,
  exitCodeFor,
  statusLabel,
  toRunError,
  MARKDOWN_TAIL_CHARS,
  type SummaryInput,
} from './summary.js';
