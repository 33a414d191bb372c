import fs from "node:fs/promises";
import path from "node:path";

import { createPathNormalizer } from "../diagnostics/paths";
import { runDiagnosticPipeline } from "../diagnostics/pipeline";
import { totalSuppressed } from "../diagnostics/suppression";
import type { FailurePolicy, PipelineResult, ReportSummary } from "../diagnostics/types";
import { renderReportHtml } from "./render/reportHtml";
import { renderReportMarkdown } from "./render/reportMarkdown";
import { readDiagnosticLogs, type SkippedLog } from "./shared/logReader";
import { loadReportConfig, parseFailurePolicy, resolveReportSettings, type ReportSettings } from "./shared/reportConfig";

export interface ReportArgs {
  logPaths: string[];
  outPath: string;
  summaryPath?: string;
  repoRoot?: string;
  configPath?: string;
  failOn?: FailurePolicy;
  format: "md" | "json";
}

export interface DiagnosticReport {
  settings: ReportSettings;
  result: PipelineResult;
  skipped: SkippedLog[];
  summary: ReportSummary;
}

const USAGE =
  "Usage: tidy-lens report --logs <file...> --out <report.html> [--summary <summary.json>] [--repo-root <dir>] [--fail-on never|error|warning] [--config <file>] [--format md|json]";

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function readValue(argv: string[], index: number, optionName: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw makeError("E_TIDY_ARG_REQUIRED", optionName);
  }

  return value;
}

function parseFormat(value: string): "md" | "json" {
  if (value === "md" || value === "json") {
    return value;
  }

  throw makeError("E_TIDY_ARG_INVALID", "--format must be md|json");
}

export function parseReportArgs(argv: string[]): ReportArgs {
  const logPaths: string[] = [];
  let outPath: string | undefined;
  const args: Omit<ReportArgs, "logPaths" | "outPath"> = {
    format: "md"
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (token === "--help" || token === "-h") {
      throw makeError("E_TIDY_HELP", USAGE);
    }

    if (token === "--logs") {
      let cursor = index + 1;
      while (cursor < argv.length && !(argv[cursor] ?? "").startsWith("--")) {
        logPaths.push(argv[cursor] ?? "");
        cursor += 1;
      }

      if (cursor === index + 1) {
        throw makeError("E_TIDY_ARG_REQUIRED", "--logs");
      }

      index = cursor - 1;
      continue;
    }

    if (token === "--out") {
      outPath = readValue(argv, index, "--out");
      index += 1;
      continue;
    }

    if (token === "--summary") {
      args.summaryPath = readValue(argv, index, "--summary");
      index += 1;
      continue;
    }

    if (token === "--repo-root") {
      args.repoRoot = readValue(argv, index, "--repo-root");
      index += 1;
      continue;
    }

    if (token === "--config") {
      args.configPath = readValue(argv, index, "--config");
      index += 1;
      continue;
    }

    if (token === "--fail-on") {
      args.failOn = parseFailurePolicy(readValue(argv, index, "--fail-on"), "--fail-on");
      index += 1;
      continue;
    }

    if (token === "--format") {
      args.format = parseFormat(readValue(argv, index, "--format").trim().toLowerCase());
      index += 1;
      continue;
    }

    throw makeError("E_TIDY_ARG_UNKNOWN", token);
  }

  if (logPaths.length === 0) {
    throw makeError("E_TIDY_ARG_REQUIRED", "--logs");
  }

  if (!outPath) {
    throw makeError("E_TIDY_ARG_REQUIRED", "--out");
  }

  return { ...args, logPaths, outPath };
}

export function shouldFail(failOn: FailurePolicy, counts: { errors: number; warnings: number }): boolean {
  if (failOn === "error") {
    return counts.errors > 0;
  }

  if (failOn === "warning") {
    return counts.errors > 0 || counts.warnings > 0;
  }

  return false;
}

export function summarizeReport(result: PipelineResult, skippedLogs: number, failOn: FailurePolicy): ReportSummary {
  const errors = result.aggregate.severityCounts.error;
  const warnings = result.aggregate.severityCounts.warning;

  return {
    errors,
    warnings,
    total: result.aggregate.total,
    files: result.aggregate.files.length,
    checks: result.aggregate.checksCount,
    suppressed: totalSuppressed(result.suppressed),
    duplicates: result.duplicates,
    skippedLogs,
    failOn,
    failed: shouldFail(failOn, { errors, warnings })
  };
}

export async function buildDiagnosticReport(
  args: ReportArgs,
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd()
): Promise<DiagnosticReport> {
  const resolvedConfig = await loadReportConfig({ configPath: args.configPath, cwd });
  const settings = resolveReportSettings(resolvedConfig, env, {
    failOn: args.failOn,
    repoRoot: args.repoRoot
  });

  const normalizePath = createPathNormalizer({ repoRoot: settings.repoRoot, cwd });
  const logPaths = args.logPaths.map((logPath) => path.resolve(cwd, logPath));
  const { logs, skipped } = await readDiagnosticLogs(logPaths, normalizePath);
  const result = runDiagnosticPipeline(logs, settings.policy);

  return {
    settings,
    result,
    skipped,
    summary: summarizeReport(result, skipped.length, settings.failOn)
  };
}

async function writeTextOutput(outputPath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_TIDY_OUTPUT_WRITE", `${outputPath}: ${message.slice(0, 220)}`);
  }
}

export async function writeReportOutputs(report: DiagnosticReport, args: ReportArgs, cwd: string = process.cwd()): Promise<string[]> {
  const written: string[] = [];

  const htmlPath = path.resolve(cwd, args.outPath);
  await writeTextOutput(htmlPath, renderReportHtml(report.result.aggregate));
  written.push(htmlPath);

  if (args.summaryPath) {
    const summaryPath = path.resolve(cwd, args.summaryPath);
    await writeTextOutput(summaryPath, `${JSON.stringify(report.summary, null, 2)}\n`);
    written.push(summaryPath);
  }

  return written;
}

export async function runReportCommand(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<number> {
  const args = parseReportArgs(argv);
  const report = await buildDiagnosticReport(args, env, cwd);

  for (const skipped of report.skipped) {
    process.stderr.write(`warning: skipped unreadable log ${skipped.path}: ${skipped.reason}\n`);
  }

  await writeReportOutputs(report, args, cwd);

  if (args.format === "json") {
    process.stdout.write(`${JSON.stringify(report.summary, null, 2)}\n`);
  } else {
    process.stdout.write(renderReportMarkdown(report.summary, report.result.aggregate));
  }

  return report.summary.failed ? 1 : 0;
}
