import type { CheckGroup, DiagnosticAggregate, DiagnosticRecord, DiagnosticSeverity } from "./types";

const SEVERITY_RANK: Record<DiagnosticSeverity, number> = {
  error: 0,
  warning: 1,
  note: 2
};

export const DEFAULT_EXAMPLES_PER_CHECK = 3;

function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

export function compareDiagnostics(left: DiagnosticRecord, right: DiagnosticRecord): number {
  const rankDelta = SEVERITY_RANK[left.severity] - SEVERITY_RANK[right.severity];
  if (rankDelta !== 0) {
    return rankDelta;
  }

  const pathCompare = compareText(left.path, right.path);
  if (pathCompare !== 0) {
    return pathCompare;
  }

  if (left.line !== right.line) {
    return left.line - right.line;
  }

  if (left.column !== right.column) {
    return left.column - right.column;
  }

  return compareText(left.check, right.check);
}

export function sortDiagnostics(records: readonly DiagnosticRecord[]): DiagnosticRecord[] {
  return [...records].sort(compareDiagnostics);
}

function toCheckGroups(byCheck: Map<string, DiagnosticRecord[]>, examplesPerCheck: number): CheckGroup[] {
  const groups = Array.from(byCheck.entries()).map(([check, records]) => ({
    check,
    count: records.length,
    examples: records.slice(0, examplesPerCheck)
  }));

  groups.sort((left, right) => {
    if (left.count !== right.count) {
      return right.count - left.count;
    }

    return compareText(left.check, right.check);
  });

  return groups;
}

export function aggregateDiagnostics(
  records: readonly DiagnosticRecord[],
  options: { examplesPerCheck?: number } = {}
): DiagnosticAggregate {
  const examplesPerCheck = Math.max(0, options.examplesPerCheck ?? DEFAULT_EXAMPLES_PER_CHECK);
  const ordered = sortDiagnostics(records);

  const severityCounts: Record<DiagnosticSeverity, number> = {
    error: 0,
    warning: 0,
    note: 0
  };
  const byCheck = new Map<string, DiagnosticRecord[]>();
  const files = new Set<string>();

  for (const record of ordered) {
    severityCounts[record.severity] += 1;
    files.add(record.path);

    const bucket = byCheck.get(record.check);
    if (bucket) {
      bucket.push(record);
    } else {
      byCheck.set(record.check, [record]);
    }
  }

  const checksCount = Array.from(byCheck.keys()).filter((check) => check.length > 0).length;

  return {
    records: ordered,
    total: ordered.length,
    severityCounts,
    byCheck,
    checkGroups: toCheckGroups(byCheck, examplesPerCheck),
    files: Array.from(files).sort(compareText),
    checksCount
  };
}
