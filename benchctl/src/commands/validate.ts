import path from "node:path";
import { loadConfig, resolvePaths } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/errors.js";
import { scanBenchmarks, scanFuzzers } from "../scan/scan.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";

export type ValidateSummary = {
  fuzzers: number;
  variants: number;
  standardBenchmarks: number;
  externalBenchmarks: number;
};

export type ValidateResult = { ok: true; summary: ValidateSummary } | { ok: false; errors: Diagnostic[] };

/** Validate the layered config, every variants.yaml and every oss-fuzz.yaml. */
export async function validateAll(opts: {
  configDir?: string;
  envName?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  schemaDir?: string;
}): Promise<ValidateResult> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e: unknown) {
    return { ok: false, errors: [diag("error", "CONFIG_UNREADABLE", errorMessage(e))] };
  }

  const res = await validateConfig(raw, opts.schemaDir);
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Invalid config: ${res.errors}`)] };
  }

  const paths = resolvePaths(res.config, opts.cwd);
  const errors: Diagnostic[] = [];

  const fuzzers = await scanFuzzers(paths.fuzzersDir, res.config.coverage_fuzzers, { schemaDir: opts.schemaDir });
  for (const f of fuzzers.failures) {
    errors.push(diag("error", f.code, f.message, { path: path.join(paths.fuzzersDir, f.fuzzer) }));
  }

  const benchmarks = await scanBenchmarks(paths.benchmarksDir, { schemaDir: opts.schemaDir });
  for (const b of benchmarks.failures) {
    errors.push(diag("error", b.code, b.message, { path: path.join(paths.benchmarksDir, b.benchmark) }));
  }

  if (errors.length > 0) return { ok: false, errors };
  return {
    ok: true,
    summary: {
      fuzzers: fuzzers.fuzzers.length,
      variants: fuzzers.fuzzers.reduce((n, f) => n + f.variants.length, 0),
      standardBenchmarks: benchmarks.standard.length,
      externalBenchmarks: benchmarks.external.length,
    },
  };
}
