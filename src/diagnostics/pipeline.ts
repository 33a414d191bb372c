import { aggregateDiagnostics } from "./aggregate";
import { dedupeDiagnostics } from "./dedupe";
import { applySuppression } from "./suppression";
import type { DiagnosticRecord, ParsedLog, PipelineResult, SuppressionPolicy } from "./types";

function* concatRecords(logs: readonly ParsedLog[]): Generator<DiagnosticRecord> {
  for (const log of logs) {
    yield* log.records;
  }
}

export function runDiagnosticPipeline(
  logs: readonly ParsedLog[],
  policy: SuppressionPolicy,
  options: { examplesPerCheck?: number } = {}
): PipelineResult {
  const { kept, suppressed } = applySuppression(concatRecords(logs), policy);
  const { records, duplicates } = dedupeDiagnostics(kept);

  return {
    aggregate: aggregateDiagnostics(records, options),
    suppressed,
    duplicates,
    unmatchedLines: logs.reduce((sum, log) => sum + log.unmatchedLines, 0)
  };
}
