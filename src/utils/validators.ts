import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

/**
 * JSON Schema Validation
 *
 * Validates payloads returned by external services before they are read.
 */

// ajv is CommonJS; under NodeNext its class sits on the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow additional properties
});

/**
 * Compile a schema into a type-guarding validator
 */
export function createValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Format validation errors as a readable string
 */
export function formatErrors(errors?: ErrorObject[] | null): string {
  if (!errors || errors.length === 0) {
    return 'No errors';
  }

  return errors
    .map((error) => {
      const path = error.instancePath || 'root';
      const message = error.message || 'validation failed';
      return `${path}: ${message}`;
    })
    .join('; ');
}

/**
 * Parse JSON without throwing
 */
export function tryParseJson(text: string | null | undefined): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
