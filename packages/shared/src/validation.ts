import Ajv2020 from "ajv/dist/2020";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { ValidationError } from "./errors";

export const ajv = new Ajv2020({ allErrors: true, strict: true, useDefaults: true });
addFormats(ajv);

function stripMetaSchema(schema: SchemaObject): SchemaObject {
  // Remove $id to prevent Ajv duplicate schema registration when a schema is compiled twice
  const { $schema: _meta, $id: _id, ...rest } = schema;
  return rest;
}

export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(stripMetaSchema(schema));
}

export function errorField(error: ErrorObject, root = "body"): string {
  const segments = error.instancePath.split("/").filter(Boolean);
  if (error.keyword === "required" && typeof error.params.missingProperty === "string") {
    segments.push(error.params.missingProperty);
  }
  return segments.length ? segments.join(".") : root;
}

/** Converts the first Ajv error into a ValidationError naming the offending field. */
export function toValidationError(
  errors: ErrorObject[] | null | undefined,
  root = "body",
): ValidationError {
  const first = errors?.[0];
  if (!first) return new ValidationError(root, `${root} is invalid`);
  const field = errorField(first, root);
  const message =
    first.keyword === "required"
      ? `${field} is required`
      : `${field} ${first.message ?? "is invalid"}`;
  return new ValidationError(field, message, {
    keyword: first.keyword,
    params: first.params,
  });
}

export function assertValid<T>(
  validator: ValidateFunction<T>,
  data: unknown,
  root = "body",
): T {
  if (validator(data)) return data;
  throw toValidationError(validator.errors, root);
}
