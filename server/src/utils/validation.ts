import type { ObjectSchema } from "joi";
import { ValidationError } from "./errors";

/**
 * Validates form or JSON fields against a Joi schema, dropping unknown
 * keys. Failures become a 400 carrying Joi's message as details.
 */
export function validateFields<T>(
  schema: ObjectSchema<T>,
  input: unknown,
  message = "Invalid request fields",
): T {
  const { error, value } = schema.validate(input ?? {}, {
    stripUnknown: true,
    abortEarly: true,
  });
  if (error) {
    throw new ValidationError(message, error.message);
  }
  return value;
}
