import fs from "node:fs";
import path from "node:path";

export const HEADER_EXTENSIONS: ReadonlySet<string> = new Set([".h", ".hh", ".hpp", ".hxx", ".h++", ".inl"]);

export interface PathNormalizerOptions {
  repoRoot?: string;
  cwd?: string;
}

export type PathNormalizer = (rawPath: string) => string;

export function normalizeLexically(rawPath: string): string {
  const slashed = rawPath.trim().replace(/\\/g, "/");
  if (!slashed) {
    return slashed;
  }

  const normalized = path.posix.normalize(slashed);
  if (normalized.length > 1 && normalized.endsWith("/")) {
    return normalized.slice(0, -1);
  }

  return normalized;
}

function tryRealpath(target: string): string | null {
  try {
    return fs.realpathSync(target);
  } catch {
    return null;
  }
}

function relativeToRoot(resolvedPath: string, resolvedRoot: string): string | null {
  const relative = path.relative(resolvedRoot, resolvedPath);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }

  return relative.split(path.sep).join("/");
}

/**
 * Maps a path as printed in a log to a repository-relative path.
 * Falls back to lexical normalization whenever the file cannot be resolved
 * under the root.
 */
export function normalizeDiagnosticPath(rawPath: string, options: PathNormalizerOptions = {}): string {
  const trimmed = rawPath.trim();
  const repoRoot = options.repoRoot?.trim();

  if (trimmed && repoRoot) {
    const cwd = options.cwd ?? process.cwd();
    const resolvedRoot = tryRealpath(path.resolve(cwd, repoRoot));
    const resolvedPath = tryRealpath(path.resolve(cwd, trimmed));

    if (resolvedRoot && resolvedPath) {
      const relative = relativeToRoot(resolvedPath, resolvedRoot);
      if (relative) {
        return relative;
      }
    }
  }

  return normalizeLexically(trimmed);
}

export function createPathNormalizer(options: PathNormalizerOptions = {}): PathNormalizer {
  const cache = new Map<string, string>();

  return (rawPath: string): string => {
    const cached = cache.get(rawPath);
    if (cached !== undefined) {
      return cached;
    }

    const normalized = normalizeDiagnosticPath(rawPath, options);
    cache.set(rawPath, normalized);
    return normalized;
  };
}

export function isHeaderPath(filePath: string): boolean {
  const segment = filePath.split(/[\\/]/).pop() ?? "";
  const dot = segment.lastIndexOf(".");
  if (dot <= 0) {
    return false;
  }

  return HEADER_EXTENSIONS.has(segment.slice(dot).toLowerCase());
}
