import { ConfigInvalidError } from "../core/errors.js";
import { createRegistry } from "../schema/registry.js";
import type { BenchConfig } from "../types/config.js";
import { loadConfig } from "./loader.js";

export type ConfigValidationResult = { valid: true; config: BenchConfig } | { valid: false; errors: string };

/** Validate a loaded config against schemas/config.schema.json. */
export async function validateConfig(config: unknown, schemaDir?: string): Promise<ConfigValidationResult> {
  const registry = await createRegistry(schemaDir);
  const check = await registry.validate("config", config);
  return check.valid ? { valid: true, config: check.value } : { valid: false, errors: check.errors };
}

/**
 * Load and validate in one step.
 * @throws ConfigInvalidError
 */
export async function loadValidConfig(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): Promise<BenchConfig> {
  const res = await validateConfig(loadConfig(opts.envName, opts.configDir, opts.env));
  if (!res.valid) throw new ConfigInvalidError(res.errors);
  return res.config;
}
