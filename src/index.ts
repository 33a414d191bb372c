export { runCli } from "./cli";
export {
  buildDiagnosticReport,
  parseReportArgs,
  runReportCommand,
  shouldFail,
  summarizeReport,
  writeReportOutputs
} from "./commands/report";
export { escapeHtml, renderReportHtml } from "./commands/render/reportHtml";
export { renderReportMarkdown } from "./commands/render/reportMarkdown";
export { decodeLogBytes, readDiagnosticLogs } from "./commands/shared/logReader";
export {
  DEFAULT_REPORT_CONFIG_PATH,
  DEFAULT_SUPPRESSION_POLICY,
  loadReportConfig,
  parseFailurePolicy,
  parseReportConfig,
  resolveReportSettings
} from "./commands/shared/reportConfig";
export { aggregateDiagnostics, compareDiagnostics, sortDiagnostics } from "./diagnostics/aggregate";
export { dedupeDiagnostics } from "./diagnostics/dedupe";
export {
  HEADER_EXTENSIONS,
  createPathNormalizer,
  isHeaderPath,
  normalizeDiagnosticPath,
  normalizeLexically
} from "./diagnostics/paths";
export { runDiagnosticPipeline } from "./diagnostics/pipeline";
export {
  applySuppression,
  createSuppressionPolicy,
  evaluateSuppression,
  mergeSuppressionPolicies
} from "./diagnostics/suppression";
export { clangTidyParser, iterateDiagnostics, parseDiagnosticLine, parseDiagnosticLog } from "./parsers/clangTidy";
export { toDiagnosticKey } from "./parsers/types";

export type { DiagnosticReport, ReportArgs } from "./commands/report";
export type { LogReadResult, SkippedLog } from "./commands/shared/logReader";
export type { ReportConfig, ReportSettings, ResolvedReportConfig } from "./commands/shared/reportConfig";
export type { PathNormalizer, PathNormalizerOptions } from "./diagnostics/paths";
export type { SuppressionPolicyInput } from "./diagnostics/suppression";
export type {
  CheckGroup,
  DiagnosticAggregate,
  DiagnosticRecord,
  DiagnosticSeverity,
  FailurePolicy,
  ParsedLog,
  PipelineResult,
  ReportSummary,
  SuppressionCounts,
  SuppressionPolicy,
  SuppressionReason
} from "./diagnostics/types";
export type { LogParser, ParserContext } from "./parsers/types";
