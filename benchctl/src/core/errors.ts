/**
 * Error taxonomy. Mandatory-step failures are thrown and surface at the
 * command boundary as `{ ok: false, error }`; best-effort failures are
 * downgraded to `skipped` outcomes and warn diagnostics.
 */
export type BenchErrorCode =
  | "NO_PRIOR_COMMIT"
  | "NO_SUITABLE_ARTIFACT"
  | "EXTERNAL_TOOL_MISSING"
  | "EXTERNAL_COMMAND_FAILED"
  | "MALFORMED_VARIANT_CONFIG"
  | "DUPLICATE_TARGET"
  | "INVALID_TARGET_NAME"
  | "INVALID_DATE"
  | "INVALID_BENCHMARK_NAME"
  | "RESERVED_BENCHMARK_NAME"
  | "MANIFEST_INVALID"
  | "CONFIG_INVALID";

export class BenchError extends Error {
  readonly code: BenchErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: BenchErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NoPriorCommitError extends BenchError {
  constructor(pathScope: string, before: Date) {
    super("NO_PRIOR_COMMIT", `No commit touching ${pathScope} found before ${before.toISOString()}`, {
      pathScope,
      before: before.toISOString(),
    });
  }
}

export class NoSuitableArtifactError extends BenchError {
  constructor(before: Date) {
    super("NO_SUITABLE_ARTIFACT", `No digest recorded at or before ${before.toISOString()}`, {
      before: before.toISOString(),
    });
  }
}

export class ExternalToolMissingError extends BenchError {
  constructor(tool: string) {
    super("EXTERNAL_TOOL_MISSING", `${tool} not found in PATH`, { tool });
  }
}

export class ExternalCommandFailedError extends BenchError {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string[], stderr: string, exitCode?: number | null) {
    const line = command.join(" ");
    super("EXTERNAL_COMMAND_FAILED", `Executing command '${line}' failed: ${stderr.trim() || "no diagnostic output"}`, {
      command: line,
      exitCode: exitCode ?? null,
    });
    this.command = line;
    this.stderr = stderr;
  }
}

export class MalformedVariantConfigError extends BenchError {
  constructor(fuzzer: string, reason: string) {
    super("MALFORMED_VARIANT_CONFIG", `Invalid variants for fuzzer ${fuzzer}: ${reason}`, { fuzzer });
  }
}

export class DuplicateTargetError extends BenchError {
  constructor(name: string) {
    super("DUPLICATE_TARGET", `Target ${name} is generated twice`, { target: name });
  }
}

export class InvalidTargetNameError extends BenchError {
  constructor(name: string) {
    super("INVALID_TARGET_NAME", `Target name ${JSON.stringify(name)} does not match [a-z0-9_-]+`, { target: name });
  }
}

export class InvalidDateError extends BenchError {
  constructor(text: string) {
    super("INVALID_DATE", `Not an ISO-8601 date: ${JSON.stringify(text)}`, { input: text });
  }
}

export class InvalidBenchmarkNameError extends BenchError {
  constructor(name: string) {
    super("INVALID_BENCHMARK_NAME", `Benchmark name ${JSON.stringify(name)} does not match [a-z0-9_-]+`, { name });
  }
}

export class ReservedBenchmarkNameError extends BenchError {
  constructor(name: string) {
    super("RESERVED_BENCHMARK_NAME", `Benchmark name ${JSON.stringify(name)} is reserved for umbrella targets`, { name });
  }
}

export class ManifestInvalidError extends BenchError {
  constructor(filePath: string, reason: string) {
    super("MANIFEST_INVALID", `Invalid benchmark manifest ${filePath}: ${reason}`, { path: filePath });
  }
}

export class ConfigInvalidError extends BenchError {
  constructor(reason: string) {
    super("CONFIG_INVALID", `Invalid config: ${reason}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
