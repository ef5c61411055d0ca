import { MalformedVariantConfigError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { Variant } from "../types/benchmark.js";

export const VARIANTS_FILE = "variants.yaml";

/**
 * Validate a parsed variants.yaml for `fuzzer`. Scalar env values are
 * stringified; names must be unique and differ from the fuzzer's own.
 *
 * @throws MalformedVariantConfigError
 */
export async function parseVariants(raw: unknown, fuzzer: string, schemas: SchemaRegistry): Promise<Variant[]> {
  const check = await schemas.validate("variants", raw);
  if (!check.valid) throw new MalformedVariantConfigError(fuzzer, check.errors);

  const seen = new Set<string>([fuzzer]);
  const variants: Variant[] = [];
  for (const v of check.value.variants) {
    if (seen.has(v.name)) {
      const reason = v.name === fuzzer ? `variant name ${v.name} equals the fuzzer name` : `duplicate variant ${v.name}`;
      throw new MalformedVariantConfigError(fuzzer, reason);
    }
    seen.add(v.name);

    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(v.env ?? {})) env[key] = String(value);
    variants.push({ name: v.name, env });
  }
  return variants;
}
