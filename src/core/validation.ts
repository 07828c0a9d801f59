import Ajv, { ErrorObject } from "ajv";

export const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  strict: false,
});

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation error";
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`).join("; ");
}
