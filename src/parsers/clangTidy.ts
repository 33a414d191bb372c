import { normalizeLexically } from "../diagnostics/paths";
import type { DiagnosticRecord, DiagnosticSeverity, ParsedLog } from "../diagnostics/types";
import type { LogParser, ParserContext } from "./types";

const DIAGNOSTIC_LINE =
  /^(?<file>[^:\n]+):(?<line>\d+):(?<column>\d+):\s+(?<severity>error|warning|note):\s+(?<message>.*?)(?:\s\[(?<check>[^\]]+)\])?\s*$/;

function toSeverity(value: string): DiagnosticSeverity | null {
  if (value === "error" || value === "warning" || value === "note") {
    return value;
  }

  return null;
}

export function parseDiagnosticLine(line: string, context: ParserContext): DiagnosticRecord | null {
  const match = line.trim().match(DIAGNOSTIC_LINE);
  if (!match?.groups) {
    return null;
  }

  const lineNumber = Number.parseInt(match.groups.line ?? "", 10);
  const column = Number.parseInt(match.groups.column ?? "", 10);
  if (!Number.isSafeInteger(lineNumber) || lineNumber <= 0 || !Number.isSafeInteger(column) || column <= 0) {
    return null;
  }

  const severity = toSeverity(match.groups.severity ?? "");
  const rawPath = (match.groups.file ?? "").trim();
  if (!severity || !rawPath) {
    return null;
  }

  const normalizedPath = context.normalizePath(rawPath);

  return {
    path: normalizedPath || rawPath,
    line: lineNumber,
    column,
    severity,
    message: (match.groups.message ?? "").trim(),
    check: match.groups.check ?? ""
  };
}

export function* iterateDiagnostics(lines: Iterable<string>, context: ParserContext): Generator<DiagnosticRecord> {
  for (const line of lines) {
    const record = parseDiagnosticLine(line, context);
    if (record) {
      yield record;
    }
  }
}

export const clangTidyParser: LogParser = {
  name: "clang-tidy",
  parse(lines: string[], context: ParserContext): DiagnosticRecord[] {
    return Array.from(iterateDiagnostics(lines, context));
  }
};

export function splitLogLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function parseDiagnosticLog(
  source: string,
  text: string,
  normalizePath: ParserContext["normalizePath"] = normalizeLexically
): ParsedLog {
  const lines = splitLogLines(text);
  const records = clangTidyParser.parse(lines, { source, normalizePath });
  const nonBlank = lines.filter((line) => line.trim().length > 0).length;

  return {
    source,
    records,
    unmatchedLines: nonBlank - records.length
  };
}
