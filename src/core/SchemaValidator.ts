import AjvModule, { type ValidateFunction, type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Schema validation result.
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

/**
 * AJV-based JSON Schema validator with coercion and default enrichment.
 *
 * Compile each schema once with `compile<T>()` and keep the returned
 * function; validation works on a clone, so the input is never mutated.
 */
export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: true,
      useDefaults: true,
      strict: false,
    });
    addFormats(this.ajv);
  }

  compile<T>(schema: object): ValidateFunction<T> {
    return this.ajv.compile<T>(schema);
  }

  /**
   * Validate data. Coerces types and applies defaults on the returned copy.
   */
  validate<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    const cloned: unknown = structuredClone(data);
    if (validate(cloned)) {
      return { valid: true, data: cloned };
    }

    return {
      valid: false,
      errors: validate.errors ?? [],
    };
  }

  /**
   * Validate and return coerced data, or throw a descriptive error.
   */
  validateOrThrow<T>(validate: ValidateFunction<T>, data: unknown, context: string): T {
    const result = this.validate(validate, data);
    if (!result.valid || result.data === undefined) {
      const errors = result.errors ?? [];
      throw new SchemaValidationError(`${context}: ${formatErrors(errors)}`, errors);
    }
    return result.data;
  }
}

export function formatErrors(errors: ErrorObject[]): string {
  return errors
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("; ");
}

/**
 * Error thrown on schema validation failure.
 */
export class SchemaValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ErrorObject[],
  ) {
    super(message);
    this.name = "SchemaValidationError";
  }
}
