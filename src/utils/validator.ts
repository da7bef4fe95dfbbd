import Ajv, { ErrorObject, Schema, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { SchemaValidationError } from "./errors";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  allowUnionTypes: true,
  useDefaults: true
});

addFormats(ajv);

/** À appeler une fois par schéma, au chargement du module qui l'utilise. */
export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Valide `payload` et le renvoie typé ; `useDefaults` complète au passage les clés absentes.
 */
export function assertValid<T>(validator: ValidateFunction<T>, payload: unknown, label = "document"): T {
  if (validator(payload)) {
    return payload;
  }

  const errors = validator.errors ?? [];
  throw new SchemaValidationError(`${label} invalide:\n${formatValidationErrors(errors)}`, errors);
}

/** Variante sans exception pour les documents best-effort (progression, métadonnées). */
export function tryValidate<T>(validator: ValidateFunction<T>, payload: unknown): T | undefined {
  return validator(payload) ? payload : undefined;
}

export function formatValidationErrors(errors: ReadonlyArray<ErrorObject>): string {
  if (!errors.length) {
    return "Schema validation failed (no details)";
  }

  return errors
    .map((error) => {
      const path = error.instancePath || "/";
      const message = error.message ?? "Invalid value";
      return `${path} ${message}`.trim();
    })
    .join("\n");
}
