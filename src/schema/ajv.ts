import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type { ValidateFunction };

export type AjvInstance = {
  compile: (schema: object) => ValidateFunction;
  errorsText: (errors?: ErrorObject[] | null) => string;
};

/** JSON Schema 2020-12 validator in strict mode, with string formats. */
export function loadAjv(): AjvInstance {
  // ajv and ajv-formats are CommonJS; their default export arrives wrapped under NodeNext.
  const AjvCtor = Ajv2020 as unknown as { new (opts: object): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/** Narrow `data` to `T` through a compiled schema for `T`. */
export function conforms<T>(validate: ValidateFunction, data: unknown): data is T {
  return validate(data);
}
