/**
 * Error types for store operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Backend errors are never wrapped by composite stores; they propagate as thrown
 */

/**
 * Base class for all store errors
 */
export abstract class StoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a data operation is issued before connect() or after close()
 */
export class StoreNotConnectedError extends StoreError {
  readonly code = "E_NOT_CONNECTED";

  constructor(storeName: string, options?: ErrorOptions) {
    super(`Store is not connected: ${storeName}. Call connect() first.`, options);
  }
}

/**
 * Thrown when a store structurally cannot perform an operation
 */
export class UnsupportedOperationError extends StoreError {
  readonly code = "E_UNSUPPORTED";

  constructor(
    public readonly operation: string,
    public readonly storeType: string,
    reason?: string,
    options?: ErrorOptions
  ) {
    super(`No ${operation} method for ${storeType}${reason ? `: ${reason}` : ""}`, options);
  }
}

/**
 * Thrown when the backing server is too old for a requested capability
 */
export class ServerVersionError extends StoreError {
  readonly code = "E_SERVER_VERSION";

  constructor(
    public readonly capability: string,
    public readonly required: string,
    public readonly actual: string,
    options?: ErrorOptions
  ) {
    super(
      `Server version ${actual} is too low to use ${capability} (requires ${required} or later)`,
      options
    );
  }
}

/**
 * Thrown when a write is attempted on a store opened read-only
 */
export class ReadOnlyError extends StoreError {
  readonly code = "E_READ_ONLY";

  constructor(storeName: string, hint?: string, options?: ErrorOptions) {
    super(`This Store is read-only: ${storeName}.${hint ? ` ${hint}` : ""}`, options);
  }
}

/**
 * Thrown for malformed store configuration (detected at construction or connect time)
 */
export class ConfigurationError extends StoreError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a strict validator rejects a document
 */
export class DocumentValidationError extends StoreError {
  readonly code = "E_VALIDATION";

  constructor(
    public readonly errors: string[],
    options?: ErrorOptions
  ) {
    super(`Document failed validation: ${errors.join("; ")}`, options);
  }
}

/**
 * Thrown when a write would break a unique index
 */
export class DuplicateKeyError extends StoreError {
  readonly code = "E_DUPLICATE_KEY";

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    options?: ErrorOptions
  ) {
    super(`Duplicate value for unique index "${field}": ${JSON.stringify(value)}`, options);
  }
}

/**
 * Thrown when a document file cannot be found
 */
export class DocumentNotFoundError extends StoreError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a document read operation fails
 */
export class DocumentReadError extends StoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends StoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends StoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js errno error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
