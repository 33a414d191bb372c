export type DiagnosticSeverity = "error" | "warning" | "note";

export const DIAGNOSTIC_SEVERITIES: readonly DiagnosticSeverity[] = ["error", "warning", "note"];

export interface DiagnosticRecord {
  readonly path: string;
  readonly line: number;
  readonly column: number;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly check: string;
}

export interface ParsedLog {
  source: string;
  records: DiagnosticRecord[];
  unmatchedLines: number;
}

export interface SuppressionPolicy {
  readonly excludedPaths: ReadonlySet<string>;
  readonly excludedPathPrefixes: ReadonlySet<string>;
  readonly excludedChecks: ReadonlySet<string>;
  readonly excludedMessageSubstrings: ReadonlySet<string>;
  readonly headerOnlyExcludedChecks: ReadonlySet<string>;
  readonly headerOnlyExcludedSeverities: ReadonlySet<DiagnosticSeverity>;
}

export type SuppressionReason =
  | "note"
  | "excluded-path"
  | "excluded-path-prefix"
  | "header-check"
  | "header-severity"
  | "excluded-check"
  | "excluded-message";

export type SuppressionCounts = Record<SuppressionReason, number>;

export interface CheckGroup {
  check: string;
  count: number;
  examples: DiagnosticRecord[];
}

export interface DiagnosticAggregate {
  records: DiagnosticRecord[];
  total: number;
  severityCounts: Record<DiagnosticSeverity, number>;
  byCheck: Map<string, DiagnosticRecord[]>;
  checkGroups: CheckGroup[];
  files: string[];
  checksCount: number;
}

export interface PipelineResult {
  aggregate: DiagnosticAggregate;
  suppressed: SuppressionCounts;
  duplicates: number;
  unmatchedLines: number;
}

export type FailurePolicy = "never" | "error" | "warning";

export const FAILURE_POLICIES: readonly FailurePolicy[] = ["never", "error", "warning"];

export interface ReportSummary {
  errors: number;
  warnings: number;
  total: number;
  files: number;
  checks: number;
  suppressed: number;
  duplicates: number;
  skippedLogs: number;
  failOn: FailurePolicy;
  failed: boolean;
}
