import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { BenchConfig, ResolvedPaths } from "../types/config.js";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

const ENV_PREFIX = "BENCHCTL_";

/** Keys whose environment override is a comma-separated list. */
const LIST_KEYS = new Set(["coverage_fuzzers"]);

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Load a YAML mapping, or an empty object if the file does not exist. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const doc: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return doc;
}

/** Apply BENCHCTL_ prefixed environment variable overrides to keys the files already define. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // BENCHCTL_BASE_TAG → base_tag
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!(configKey in result)) continue;
    result[configKey] = LIST_KEYS.has(configKey)
      ? value.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
      : value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← BENCHCTL_* variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Optional environment name (e.g. "ci"); loads `<configDir>/<envName>.yaml` as an override layer.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

/** Resolve the configured directories: root_dir against `cwd`, the rest against root_dir. */
export function resolvePaths(config: BenchConfig, cwd: string = process.cwd()): ResolvedPaths {
  const rootDir = path.resolve(cwd, config.root_dir);
  return {
    rootDir,
    benchmarksDir: path.resolve(rootDir, config.benchmarks_dir),
    fuzzersDir: path.resolve(rootDir, config.fuzzers_dir),
    ossFuzzDir: path.resolve(rootDir, config.oss_fuzz_dir),
  };
}
