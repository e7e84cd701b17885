/**
 * JSON Schema document validation
 */

import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import { ConfigurationError } from "../errors.js";
import type { Document, Validator } from "../types.js";

export interface JSONSchemaValidatorOptions {
  /** Reject invalid documents (default: true). When false, stores log and skip them. */
  strict?: boolean;
}

/**
 * Validator backed by a JSON Schema (draft 2020-12)
 *
 * @example
 * ```typescript
 * const validator = new JSONSchemaValidator({
 *   type: "object",
 *   required: ["task_id"],
 *   properties: { task_id: { type: "string" } },
 * });
 * const store = new MemoryStore({ validator });
 * ```
 */
export class JSONSchemaValidator implements Validator {
  readonly strict: boolean;
  readonly schema: Record<string, unknown>;
  #validate: ValidateFunction;

  /**
   * @throws {ConfigurationError} If the schema does not compile
   */
  constructor(schema: Record<string, unknown>, options: JSONSchemaValidatorOptions = {}) {
    this.strict = options.strict ?? true;
    this.schema = schema;

    const ajv = new Ajv2020({ allErrors: true, strict: false });
    try {
      this.#validate = ajv.compile(schema);
    } catch (err) {
      throw new ConfigurationError(
        "Invalid JSON schema",
        [err instanceof Error ? err.message : String(err)],
        { cause: err }
      );
    }
  }

  isValid(doc: Document): boolean {
    return this.#validate(doc);
  }

  /**
   * Errors as "<json-pointer>: <message>" strings; empty for a valid document
   */
  validationErrors(doc: Document): string[] {
    if (this.#validate(doc)) {
      return [];
    }
    return (this.#validate.errors ?? []).map((err) => `${pointer(err)}: ${err.message ?? "is invalid"}`);
  }
}

/**
 * JSON Pointer of the offending value; required-property errors point at
 * the missing property
 */
function pointer(err: ErrorObject): string {
  const base = err.instancePath;
  const missing: unknown = err.params.missingProperty;
  if (err.keyword === "required" && typeof missing === "string") {
    return `${base}/${missing}`;
  }
  return base || "/";
}
