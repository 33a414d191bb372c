#!/usr/bin/env node
import { runReportCommand } from "./commands/report";

function renderHelp(): string {
  return [
    "tidy-lens CLI",
    "",
    "Usage:",
    "  tidy-lens report --logs <file...> --out <report.html> [--summary <summary.json>]",
    "                   [--repo-root <dir>] [--fail-on never|error|warning] [--config <file>] [--format md|json]",
    "",
    "Environment:",
    "  CT_SUPPRESS_CHECKS, CT_SUPPRESS_MSG_SUBSTR, CT_HEADER_SUPPRESS_CHECKS  comma-separated",
    "  CT_EXCLUDE_PATHS, CT_EXCLUDE_PATH_PREFIXES                            newline-separated",
    "  CT_REPO_ROOT, CT_FAIL_ON",
    "",
    "Backward compatibility:",
    "  tidy-lens --logs ... --out ... (implicit report mode)",
    ""
  ].join("\n");
}

export async function runCli(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const first = argv[0];

  if (!first || first === "--help" || first === "-h" || first === "help") {
    process.stdout.write(renderHelp());
    return 0;
  }

  if (first.startsWith("--")) {
    return runReportCommand(argv, env);
  }

  const command = first.trim().toLowerCase();
  const rest = argv.slice(1);

  if (command === "report") {
    return runReportCommand(rest, env);
  }

  throw new Error(`E_TIDY_UNKNOWN_COMMAND: '${command}'. Use --help to view supported commands.`);
}

if (require.main === module) {
  runCli()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);

      if (message.startsWith("E_TIDY_HELP:")) {
        process.stdout.write(`${message.replace(/^E_TIDY_HELP:\s*/, "")}\n`);
        process.exit(0);
      }

      process.stderr.write(`tidy-lens failed: ${message}\n`);
      process.exit(1);
    });
}
