import Ajv2020 from "ajv/dist/2020.js";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: object) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

let shared: AjvInstance | null = null;

/** Shared ajv instance (draft 2020-12, strict, all errors). */
export function loadAjv(): AjvInstance {
  if (shared) return shared;
  const AjvCtor = Ajv2020 as unknown as { new (opts: object): AjvInstance };
  shared = new AjvCtor({ allErrors: true, strict: true });
  return shared;
}

/** Compile once, validate many: returns a type guard plus a formatter for the last failure. */
export function compileSchema<T>(schema: object): { check: AjvValidateFn<T>; explain: () => string } {
  const ajv = loadAjv();
  const check = ajv.compile<T>(schema);
  return { check, explain: () => ajv.errorsText(check.errors) };
}
