import fs from "node:fs";
import path from "node:path";
import { BenchError, InvalidBenchmarkNameError, ReservedBenchmarkNameError, errorMessage } from "../core/errors.js";
import { isNameToken, isReservedBenchmarkName, safePath, sanitizePathComponent } from "../core/security.js";
import { silentReporter, type Reporter } from "../core/reporter.js";
import { diag } from "../types/diagnostic.js";
import type { BenchmarkManifest } from "../types/benchmark.js";
import type { BaseImagePin, PinningResolver } from "../pinning/resolver.js";
import { copyDirContents } from "./copy.js";
import { parseCommitDate } from "./dates.js";
import { buildManifest, writeBenchmarkManifest } from "./manifest.js";

export type IntegrationRequest = {
  project: string;
  fuzzTarget: string;
  /** Absolute path of the project's repository inside the builder image, e.g. /src/systemd. */
  repoPath: string;
  /** ISO-8601 date the benchmark is pinned to. */
  date: string;
  /** Project commit the benchmark is built at, if known. */
  commit?: string | null;
  benchmarkName?: string;
};

export type IntegrationResult =
  | {
      ok: true;
      benchmark: string;
      benchmarkDir: string;
      manifestPath: string;
      manifest: BenchmarkManifest;
      upstreamCommit: string;
      copiedFiles: string[];
      basePin: BaseImagePin;
    }
  | { ok: false; error: { code: string; message: string; details?: Record<string, unknown> } };

export type BenchmarkIntegratorDeps = {
  resolver: PinningResolver;
  /** Root of the upstream (OSS-Fuzz) checkout. */
  ossFuzzDir: string;
  benchmarksDir: string;
  reporter?: Reporter;
  schemaDir?: string;
};

/** `explicit` when given, otherwise `<project>_<fuzzTarget>`. */
export function benchmarkName(project: string, fuzzTarget: string, explicit?: string): string {
  return explicit ?? `${project}_${fuzzTarget}`;
}

/**
 * Turns an upstream project, as of a date, into a pinned benchmark directory
 * with an oss-fuzz.yaml manifest.
 *
 * Steps already completed are not rolled back on failure: a copied directory
 * stays on disk if a later step aborts.
 */
export class BenchmarkIntegrator {
  private readonly reporter: Reporter;

  constructor(private readonly deps: BenchmarkIntegratorDeps) {
    this.reporter = deps.reporter ?? silentReporter;
  }

  async integrate(req: IntegrationRequest): Promise<IntegrationResult> {
    try {
      return await this.run(req);
    } catch (e: unknown) {
      if (e instanceof BenchError) {
        return { ok: false, error: { code: e.code, message: e.message, details: e.details } };
      }
      return { ok: false, error: { code: "INTEGRATION_FAILED", message: errorMessage(e) } };
    }
  }

  private async run(req: IntegrationRequest): Promise<Extract<IntegrationResult, { ok: true }>> {
    const name = benchmarkName(req.project, req.fuzzTarget, req.benchmarkName);
    if (!isNameToken(name)) throw new InvalidBenchmarkNameError(name);
    if (isReservedBenchmarkName(name)) throw new ReservedBenchmarkNameError(name);
    const project = sanitizePathComponent(req.project);
    const commitDate = parseCommitDate(req.date);

    const benchmarksDir = path.resolve(this.deps.benchmarksDir);
    const benchmarkDir = safePath(benchmarksDir, name);
    if (fs.existsSync(benchmarkDir)) {
      this.reporter.report(
        diag("warn", "BENCHMARK_DIR_EXISTS", `${benchmarkDir} already exists; colliding files will be overwritten.`),
      );
    }

    const subtree = path.posix.join("projects", project);
    const projectDir = safePath(path.resolve(this.deps.ossFuzzDir), "projects", project);

    const pinned = await this.deps.resolver.withPinnedCheckout(project, commitDate, subtree, () =>
      copyDirContents(projectDir, benchmarkDir),
    );
    this.reporter.report(
      diag("info", "UPSTREAM_PINNED", `Copied ${subtree} at ${pinned.commit} into ${benchmarkDir}.`),
    );

    const basePin = await this.deps.resolver.pinBaseImage(commitDate, path.join(benchmarkDir, "Dockerfile"));

    const manifest = buildManifest({
      project,
      fuzzTarget: req.fuzzTarget,
      commit: req.commit ?? null,
      commitDate,
      repoPath: req.repoPath,
      benchmark: name,
      ossFuzzCommit: pinned.commit,
      baseBuilderDigest: basePin.status === "ok" ? basePin.digest : undefined,
    });
    const manifestPath = await writeBenchmarkManifest(benchmarkDir, manifest, this.deps.schemaDir);

    return {
      ok: true,
      benchmark: name,
      benchmarkDir,
      manifestPath,
      manifest,
      upstreamCommit: pinned.commit,
      copiedFiles: pinned.result,
      basePin,
    };
  }
}
