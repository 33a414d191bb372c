import type { PathNormalizer } from "../diagnostics/paths";
import type { DiagnosticRecord } from "../diagnostics/types";

export interface ParserContext {
  source: string;
  normalizePath: PathNormalizer;
}

export interface LogParser {
  readonly name: string;
  parse: (lines: string[], context: ParserContext) => DiagnosticRecord[];
}

export function toDiagnosticKey(record: DiagnosticRecord): string {
  return JSON.stringify([record.path, record.line, record.column, record.check, record.message]);
}
