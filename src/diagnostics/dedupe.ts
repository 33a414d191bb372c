import { toDiagnosticKey } from "../parsers/types";
import type { DiagnosticRecord } from "./types";

export function dedupeDiagnostics(records: Iterable<DiagnosticRecord>): { records: DiagnosticRecord[]; duplicates: number } {
  const seen = new Set<string>();
  const deduped: DiagnosticRecord[] = [];
  let duplicates = 0;

  for (const record of records) {
    const key = toDiagnosticKey(record);
    if (seen.has(key)) {
      duplicates += 1;
      continue;
    }

    seen.add(key);
    deduped.push(record);
  }

  return { records: deduped, duplicates };
}
