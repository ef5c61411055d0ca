import { resolve, isAbsolute } from "node:path";

/** One token of a generated target name; also the shape of fuzzer, variant and benchmark names. */
export const NAME_TOKEN = /^[a-z0-9_-]+$/;

/** Characters that survive a POSIX shell unquoted. */
const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** build-<owner>-all and pull-<owner>-all are umbrellas, so no benchmark may be called "all". */
const RESERVED_BENCHMARK_NAMES: ReadonlySet<string> = new Set(["all"]);

export function isNameToken(name: string): boolean {
  return NAME_TOKEN.test(name);
}

export function isReservedBenchmarkName(name: string): boolean {
  return RESERVED_BENCHMARK_NAMES.has(name);
}

/**
 * Sanitize a single path component (project or benchmark name).
 * @throws Error on empty input, separators or traversal
 */
export function sanitizePathComponent(component: string): string {
  const trimmed = component.trim();
  if (trimmed.length === 0) {
    throw new Error("Path component cannot be empty");
  }
  if (trimmed === "." || trimmed.includes("..") || /[/\\\0]/.test(trimmed)) {
    throw new Error(`Invalid path component: ${component}`);
  }
  return trimmed;
}

/**
 * Join components under an absolute base, refusing to leave it.
 * @throws Error if the result escapes `base`
 */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }
  const fullPath = resolve(base, ...components.map(sanitizePathComponent));
  const normalizedBase = resolve(base);
  if (!fullPath.startsWith(normalizedBase + "/") && fullPath !== normalizedBase) {
    throw new Error(`Path traversal detected: ${fullPath}`);
  }
  return fullPath;
}

/** Single-quote `value` for a POSIX shell unless it is already safe bare. */
export function shellQuote(value: string): string {
  if (value.length > 0 && SHELL_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}
