import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** ajv's compiled validator: a type guard that records errors on failure. */
export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

/** 2020-12 draft; union types are allowed for nullable and scalar fields. */
export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true });
  add(ajv);

  return ajv;
}
