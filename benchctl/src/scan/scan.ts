import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import {
  BenchError,
  InvalidBenchmarkNameError,
  InvalidTargetNameError,
  MalformedVariantConfigError,
  ReservedBenchmarkNameError,
  errorMessage,
} from "../core/errors.js";
import { isNameToken, isReservedBenchmarkName } from "../core/security.js";
import { createRegistry } from "../schema/registry.js";
import { MANIFEST_FILE, readBenchmarkManifest } from "../integrate/manifest.js";
import type { ExternalBenchmark, Fuzzer, StandardBenchmark } from "../types/benchmark.js";
import type { BenchmarkFailure, FuzzerFailure } from "../types/target.js";
import { VARIANTS_FILE, parseVariants } from "./variants.js";

export const BUILD_SCRIPT = "build.sh";

export type ScanOptions = {
  /** Sort discovered names by code unit (default). `false` keeps directory order. */
  sort?: boolean;
  schemaDir?: string;
};

export type BenchmarkScan = {
  standard: StandardBenchmark[];
  external: ExternalBenchmark[];
  failures: BenchmarkFailure[];
};

export type FuzzerScan = {
  fuzzers: Fuzzer[];
  failures: FuzzerFailure[];
};

function listSubdirs(dir: string, sort: boolean): string[] {
  if (!fs.existsSync(dir)) return [];
  const names = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => e.name);
  return sort ? names.sort() : names;
}

/**
 * Benchmarks are classified by marker files: build.sh makes a standard
 * benchmark, oss-fuzz.yaml an externally-derived one. A directory carrying
 * both is listed under both kinds; one with neither is ignored.
 */
export async function scanBenchmarks(benchmarksDir: string, opts: ScanOptions = {}): Promise<BenchmarkScan> {
  const scan: BenchmarkScan = { standard: [], external: [], failures: [] };

  for (const name of listSubdirs(benchmarksDir, opts.sort ?? true)) {
    const dir = path.join(benchmarksDir, name);
    const isStandard = fs.existsSync(path.join(dir, BUILD_SCRIPT));
    const isExternal = fs.existsSync(path.join(dir, MANIFEST_FILE));
    if (!isStandard && !isExternal) continue;
    if (!isNameToken(name) || isReservedBenchmarkName(name)) {
      const e = isNameToken(name) ? new ReservedBenchmarkNameError(name) : new InvalidBenchmarkNameError(name);
      scan.failures.push({ benchmark: name, code: e.code, message: e.message });
      continue;
    }
    if (isStandard) {
      scan.standard.push({ name, kind: "standard" });
    }
    if (isExternal) {
      try {
        const manifest = await readBenchmarkManifest(dir, opts.schemaDir);
        scan.external.push({ name, kind: "externally-derived", manifest });
      } catch (e: unknown) {
        const code = e instanceof BenchError ? e.code : "MANIFEST_INVALID";
        scan.failures.push({ benchmark: name, code, message: errorMessage(e) });
      }
    }
  }
  return scan;
}

/**
 * Every subdirectory of `fuzzersDir` is a fuzzer. A fuzzer whose
 * variants.yaml is malformed is reported in `failures` and left out.
 */
export async function scanFuzzers(
  fuzzersDir: string,
  coverageFuzzers: readonly string[],
  opts: ScanOptions = {},
): Promise<FuzzerScan> {
  const schemas = await createRegistry(opts.schemaDir);
  const coverage = new Set(coverageFuzzers);
  const scan: FuzzerScan = { fuzzers: [], failures: [] };

  for (const name of listSubdirs(fuzzersDir, opts.sort ?? true)) {
    if (!isNameToken(name)) {
      const e = new InvalidTargetNameError(name);
      scan.failures.push({ fuzzer: name, code: e.code, message: e.message });
      continue;
    }
    const variantsPath = path.join(fuzzersDir, name, VARIANTS_FILE);
    try {
      let variants: Fuzzer["variants"] = [];
      if (fs.existsSync(variantsPath)) {
        variants = await parseVariants(readYaml(variantsPath, name), name, schemas);
      }
      scan.fuzzers.push({ name, coverageOnly: coverage.has(name), variants });
    } catch (e: unknown) {
      if (!(e instanceof MalformedVariantConfigError)) throw e;
      scan.failures.push({ fuzzer: name, code: e.code, message: e.message });
    }
  }
  return scan;
}

function readYaml(filePath: string, fuzzer: string): unknown {
  try {
    return YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    throw new MalformedVariantConfigError(fuzzer, errorMessage(e));
  }
}
