import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance } from "./ajv.js";
import type { BenchConfig } from "../types/config.js";
import type { BenchmarkManifest } from "../types/benchmark.js";

export type VariantsFile = {
  variants: Array<{ name: string; env?: Record<string, string | number | boolean> }>;
};

export type RegistryListingJson = Array<{
  digest: string;
  tags?: string[];
  timestamp: { datetime: string };
}>;

/** Schema file name (without `.schema.json`) → the document type it describes. */
export type SchemaTypes = {
  config: BenchConfig;
  variants: VariantsFile;
  "oss-fuzz-manifest": BenchmarkManifest;
  "registry-listing": RegistryListingJson;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

/**
 * Loads the *.schema.json files shipped with benchctl and
 * validates documents against them by name.
 */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const raw = fs.readFileSync(path.join(this.schemaDir, file), "utf8");
      // "variants.schema.json" → "variants"
      this.schemas.set(file.replace(/\.schema\.json$/, ""), JSON.parse(raw));
    }

    this.ajv = await loadAjv();
  }

  /** Validate `data`; on success the value comes back typed. */
  async validate<K extends SchemaName>(name: K, data: unknown): Promise<SchemaCheck<SchemaTypes[K]>> {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new Error(`Schema not found: ${name}`);
    }
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }

    // ajv caches compiled validators by schema object.
    const check = this.ajv.compile<SchemaTypes[K]>(schema);
    if (check(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(check.errors) };
  }
}

let shared: Promise<SchemaRegistry> | null = null;

/** Create and load a registry; without a directory the process-wide one is reused. */
export function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  if (schemaDir === undefined && shared) return shared;
  const registry = new SchemaRegistry(schemaDir);
  const loaded = registry.load().then(() => registry);
  if (schemaDir === undefined) shared = loaded;
  return loaded;
}
