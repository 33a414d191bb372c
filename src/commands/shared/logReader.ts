import fs from "node:fs/promises";

import type { PathNormalizer } from "../../diagnostics/paths";
import type { ParsedLog } from "../../diagnostics/types";
import { parseDiagnosticLog } from "../../parsers/clangTidy";

export interface SkippedLog {
  path: string;
  reason: string;
}

export interface LogReadResult {
  logs: ParsedLog[];
  skipped: SkippedLog[];
}

const UTF8_BOM = "\uFEFF";

// Invalid UTF-8 sequences decode to U+FFFD instead of failing the file.
export function decodeLogBytes(raw: Uint8Array): string {
  const text = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString("utf8");
  return text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
}

export async function readDiagnosticLogs(logPaths: readonly string[], normalizePath: PathNormalizer): Promise<LogReadResult> {
  const logs: ParsedLog[] = [];
  const skipped: SkippedLog[] = [];

  for (const logPath of logPaths) {
    let raw: Buffer;
    try {
      raw = await fs.readFile(logPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      skipped.push({ path: logPath, reason: message.slice(0, 220) });
      continue;
    }

    logs.push(parseDiagnosticLog(logPath, decodeLogBytes(raw), normalizePath));
  }

  return { logs, skipped };
}
