import type { DiagnosticAggregate, ReportSummary } from "../../diagnostics/types";

const MAX_LISTED_CHECKS = 10;

export function renderReportMarkdown(summary: ReportSummary, aggregate: DiagnosticAggregate): string {
  const lines: string[] = [];
  lines.push(`## Clang-Tidy Diagnostics (${summary.total})`);
  lines.push("");
  lines.push(`- Errors: ${summary.errors}`);
  lines.push(`- Warnings: ${summary.warnings}`);
  lines.push(`- Files: ${summary.files}`);
  lines.push(`- Checks: ${summary.checks}`);
  lines.push(`- Suppressed: ${summary.suppressed}`);
  lines.push(`- Duplicates removed: ${summary.duplicates}`);

  if (summary.skippedLogs > 0) {
    lines.push(`- Unreadable logs skipped: ${summary.skippedLogs}`);
  }

  lines.push("");

  const named = aggregate.checkGroups.filter((group) => group.check.length > 0);
  if (named.length > 0) {
    lines.push("### Top Checks");
    lines.push("");
    for (const group of named.slice(0, MAX_LISTED_CHECKS)) {
      lines.push(`- ${group.check}: ${group.count}`);
    }
    lines.push("");
  }

  const verdict = summary.failed ? "FAILED" : "PASSED";
  lines.push(`Gate (--fail-on ${summary.failOn}): ${verdict}`);

  return `${lines.join("\n").trimEnd()}\n`;
}
