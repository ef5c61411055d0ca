import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ManifestInvalidError } from "../core/errors.js";
import { createRegistry } from "../schema/registry.js";
import type { BenchmarkManifest } from "../types/benchmark.js";

export const MANIFEST_FILE = "oss-fuzz.yaml";

export type ManifestInput = {
  project: string;
  fuzzTarget: string;
  commit: string | null;
  commitDate: Date;
  repoPath: string;
  benchmark: string;
  ossFuzzCommit?: string;
  baseBuilderDigest?: string;
};

/** Assemble the manifest record; optional pins are omitted when absent. */
export function buildManifest(input: ManifestInput): BenchmarkManifest {
  const manifest: BenchmarkManifest = {
    project: input.project,
    fuzz_target: input.fuzzTarget,
    commit: input.commit,
    commit_date: input.commitDate.toISOString(),
    repo_path: input.repoPath,
    benchmark: input.benchmark,
  };
  if (input.ossFuzzCommit) manifest.oss_fuzz_commit = input.ossFuzzCommit;
  if (input.baseBuilderDigest) manifest.base_builder_digest = input.baseBuilderDigest;
  return manifest;
}

/** Validate and write `oss-fuzz.yaml` into `benchmarkDir`, replacing any previous one. */
export async function writeBenchmarkManifest(
  benchmarkDir: string,
  manifest: BenchmarkManifest,
  schemaDir?: string,
): Promise<string> {
  const filePath = path.join(benchmarkDir, MANIFEST_FILE);
  const check = await (await createRegistry(schemaDir)).validate("oss-fuzz-manifest", manifest);
  if (!check.valid) throw new ManifestInvalidError(filePath, check.errors);

  fs.mkdirSync(benchmarkDir, { recursive: true });
  fs.writeFileSync(filePath, YAML.stringify(check.value), "utf8");
  return filePath;
}

export async function readBenchmarkManifest(benchmarkDir: string, schemaDir?: string): Promise<BenchmarkManifest> {
  const filePath = path.join(benchmarkDir, MANIFEST_FILE);
  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    throw new ManifestInvalidError(filePath, e instanceof Error ? e.message : String(e));
  }

  const check = await (await createRegistry(schemaDir)).validate("oss-fuzz-manifest", doc);
  if (!check.valid) throw new ManifestInvalidError(filePath, check.errors);
  return check.value;
}
