import { isHeaderPath } from "./paths";
import type {
  DiagnosticRecord,
  DiagnosticSeverity,
  SuppressionCounts,
  SuppressionPolicy,
  SuppressionReason
} from "./types";

export interface SuppressionPolicyInput {
  excludedPaths?: Iterable<string>;
  excludedPathPrefixes?: Iterable<string>;
  excludedChecks?: Iterable<string>;
  excludedMessageSubstrings?: Iterable<string>;
  headerOnlyExcludedChecks?: Iterable<string>;
  headerOnlyExcludedSeverities?: Iterable<DiagnosticSeverity>;
}

function toSet<T extends string>(values: Iterable<T> | undefined): ReadonlySet<T> {
  const result = new Set<T>();

  for (const value of values ?? []) {
    if (value.length > 0) {
      result.add(value);
    }
  }

  return result;
}

export function createSuppressionPolicy(input: SuppressionPolicyInput = {}): SuppressionPolicy {
  return Object.freeze({
    excludedPaths: toSet(input.excludedPaths),
    excludedPathPrefixes: toSet(input.excludedPathPrefixes),
    excludedChecks: toSet(input.excludedChecks),
    excludedMessageSubstrings: toSet(input.excludedMessageSubstrings),
    headerOnlyExcludedChecks: toSet(input.headerOnlyExcludedChecks),
    headerOnlyExcludedSeverities: toSet(input.headerOnlyExcludedSeverities)
  });
}

export function mergeSuppressionPolicies(base: SuppressionPolicy, extra: SuppressionPolicyInput): SuppressionPolicy {
  return createSuppressionPolicy({
    excludedPaths: [...base.excludedPaths, ...(extra.excludedPaths ?? [])],
    excludedPathPrefixes: [...base.excludedPathPrefixes, ...(extra.excludedPathPrefixes ?? [])],
    excludedChecks: [...base.excludedChecks, ...(extra.excludedChecks ?? [])],
    excludedMessageSubstrings: [...base.excludedMessageSubstrings, ...(extra.excludedMessageSubstrings ?? [])],
    headerOnlyExcludedChecks: [...base.headerOnlyExcludedChecks, ...(extra.headerOnlyExcludedChecks ?? [])],
    headerOnlyExcludedSeverities: [
      ...base.headerOnlyExcludedSeverities,
      ...(extra.headerOnlyExcludedSeverities ?? [])
    ]
  });
}

function hasPrefix(filePath: string, prefixes: ReadonlySet<string>): boolean {
  for (const prefix of prefixes) {
    // Raw string prefix, not segment-aware: "vendor" also matches "vendored/".
    if (filePath.startsWith(prefix)) {
      return true;
    }
  }

  return false;
}

function containsAny(message: string, substrings: ReadonlySet<string>): boolean {
  for (const substring of substrings) {
    if (substring && message.includes(substring)) {
      return true;
    }
  }

  return false;
}

/**
 * Returns why a record is dropped, or null when it is kept. The first
 * matching rule wins; notes are dropped before any policy rule runs.
 */
export function evaluateSuppression(record: DiagnosticRecord, policy: SuppressionPolicy): SuppressionReason | null {
  if (record.severity === "note") {
    return "note";
  }

  if (policy.excludedPaths.has(record.path)) {
    return "excluded-path";
  }

  if (hasPrefix(record.path, policy.excludedPathPrefixes)) {
    return "excluded-path-prefix";
  }

  if (isHeaderPath(record.path)) {
    if (policy.headerOnlyExcludedChecks.has(record.check)) {
      return "header-check";
    }

    if (policy.headerOnlyExcludedSeverities.has(record.severity)) {
      return "header-severity";
    }
  }

  if (policy.excludedChecks.has(record.check)) {
    return "excluded-check";
  }

  if (containsAny(record.message, policy.excludedMessageSubstrings)) {
    return "excluded-message";
  }

  return null;
}

export function emptySuppressionCounts(): SuppressionCounts {
  return {
    note: 0,
    "excluded-path": 0,
    "excluded-path-prefix": 0,
    "header-check": 0,
    "header-severity": 0,
    "excluded-check": 0,
    "excluded-message": 0
  };
}

export function totalSuppressed(counts: SuppressionCounts): number {
  return Object.values(counts).reduce((sum, count) => sum + count, 0);
}

export function applySuppression(
  records: Iterable<DiagnosticRecord>,
  policy: SuppressionPolicy
): { kept: DiagnosticRecord[]; suppressed: SuppressionCounts } {
  const kept: DiagnosticRecord[] = [];
  const suppressed = emptySuppressionCounts();

  for (const record of records) {
    const reason = evaluateSuppression(record, policy);
    if (reason) {
      suppressed[reason] += 1;
      continue;
    }

    kept.push(record);
  }

  return { kept, suppressed };
}
