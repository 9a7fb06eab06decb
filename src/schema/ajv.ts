import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | null = null;

export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}
