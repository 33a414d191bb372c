import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { createSuppressionPolicy, mergeSuppressionPolicies } from "../../diagnostics/suppression";
import { FAILURE_POLICIES, type FailurePolicy, type SuppressionPolicy } from "../../diagnostics/types";

const SeveritySchema = z.enum(["error", "warning", "note"]);
const FailurePolicySchema = z.enum(["never", "error", "warning"]);

const ReportConfigSchema = z.object({
  version: z.literal(1),
  repoRoot: z.string().min(1).optional(),
  failOn: FailurePolicySchema.optional(),
  suppress: z
    .object({
      checks: z.array(z.string().min(1)).default([]),
      messageSubstrings: z.array(z.string().min(1)).default([]),
      paths: z.array(z.string().min(1)).default([]),
      pathPrefixes: z.array(z.string().min(1)).default([]),
      headerChecks: z.array(z.string().min(1)).default([]),
      headerSeverities: z.array(SeveritySchema).default([])
    })
    .default({})
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

export interface ResolvedReportConfig {
  config: ReportConfig;
  configPath: string;
  source: "default" | "file";
}

export interface ReportSettings {
  policy: SuppressionPolicy;
  repoRoot?: string;
  failOn: FailurePolicy;
  configPath: string;
  configSource: "default" | "file";
}

export const DEFAULT_REPORT_CONFIG_PATH = ".tidy-lens.json";

export const DEFAULT_SUPPRESSION_POLICY: SuppressionPolicy = createSuppressionPolicy({
  excludedChecks: ["IgnoreClassesWithAllMemberVariablesBeingPublic"],
  excludedMessageSubstrings: ["IgnoreClassesWithAllMemberVariablesBeingPublic"],
  headerOnlyExcludedChecks: [
    "readability-magic-numbers",
    "cppcoreguidelines-avoid-magic-numbers",
    "readability-identifier-naming"
  ],
  // Unreachable while notes are dropped first; kept so configs can extend it.
  headerOnlyExcludedSeverities: ["note"]
});

const DEFAULT_REPORT_CONFIG: ReportConfig = {
  version: 1,
  suppress: {
    checks: [],
    messageSubstrings: [],
    paths: [],
    pathPrefixes: [],
    headerChecks: [],
    headerSeverities: []
  }
};

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathLabel} ${issue.message}`;
    })
    .join("; ")
    .slice(0, 500);
}

export function parseReportConfig(raw: unknown): ReportConfig {
  try {
    return ReportConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw makeError("E_TIDY_CONFIG_INVALID", formatZodIssues(error));
    }

    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_TIDY_CONFIG_INVALID", message.slice(0, 220));
  }
}

export async function loadReportConfig(options: {
  configPath?: string;
  cwd?: string;
} = {}): Promise<ResolvedReportConfig> {
  const cwd = options.cwd ?? process.cwd();
  const requestedPath = options.configPath?.trim();
  const resolvedPath = path.resolve(cwd, requestedPath && requestedPath.length > 0 ? requestedPath : DEFAULT_REPORT_CONFIG_PATH);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code === "ENOENT") {
      if (requestedPath && requestedPath.length > 0) {
        throw makeError("E_TIDY_CONFIG_NOT_FOUND", `config file not found: ${resolvedPath}`);
      }

      return {
        config: DEFAULT_REPORT_CONFIG,
        configPath: resolvedPath,
        source: "default"
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_TIDY_CONFIG_READ", message.slice(0, 220));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_TIDY_CONFIG_INVALID_JSON", message.slice(0, 220));
  }

  return {
    config: parseReportConfig(parsed),
    configPath: resolvedPath,
    source: "file"
  };
}

export function splitCommaList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function splitLineList(value: string | undefined): string[] {
  return (value ?? "")
    .split(/\r?\n/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseFailurePolicy(value: string, source: string): FailurePolicy {
  const normalized = value.trim().toLowerCase();
  const parsed = FailurePolicySchema.safeParse(normalized);
  if (!parsed.success) {
    throw makeError("E_TIDY_ARG_INVALID", `${source} must be ${FAILURE_POLICIES.join("|")} (got '${value}')`);
  }

  return parsed.data;
}

/**
 * Builds the run's immutable settings: built-in defaults, then the config
 * file, then environment overrides. `failOnOverride` comes from the command
 * line and wins over everything else.
 */
export function resolveReportSettings(
  resolved: ResolvedReportConfig,
  env: NodeJS.ProcessEnv,
  overrides: { failOn?: FailurePolicy; repoRoot?: string } = {}
): ReportSettings {
  const { config } = resolved;

  const policy = mergeSuppressionPolicies(DEFAULT_SUPPRESSION_POLICY, {
    excludedChecks: [...config.suppress.checks, ...splitCommaList(env.CT_SUPPRESS_CHECKS)],
    excludedMessageSubstrings: [...config.suppress.messageSubstrings, ...splitCommaList(env.CT_SUPPRESS_MSG_SUBSTR)],
    excludedPaths: [...config.suppress.paths, ...splitLineList(env.CT_EXCLUDE_PATHS)],
    excludedPathPrefixes: [...config.suppress.pathPrefixes, ...splitLineList(env.CT_EXCLUDE_PATH_PREFIXES)],
    headerOnlyExcludedChecks: [...config.suppress.headerChecks, ...splitCommaList(env.CT_HEADER_SUPPRESS_CHECKS)],
    headerOnlyExcludedSeverities: config.suppress.headerSeverities
  });

  const envFailOnRaw = env.CT_FAIL_ON?.trim();
  const envFailOn = envFailOnRaw ? parseFailurePolicy(envFailOnRaw, "CT_FAIL_ON") : undefined;
  const failOn = overrides.failOn ?? envFailOn ?? config.failOn ?? "never";

  const envRepoRoot = env.CT_REPO_ROOT?.trim();
  const repoRoot = overrides.repoRoot ?? (envRepoRoot || undefined) ?? config.repoRoot;

  return {
    policy,
    repoRoot,
    failOn,
    configPath: resolved.configPath,
    configSource: resolved.source
  };
}
