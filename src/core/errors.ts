/**
 * Error thrown when a dataset index or a table cannot be found.
 * `target` is the missing path (for an index) or the table name.
 */
export class NotFoundError extends Error {
  public readonly target: string;

  constructor(target: string, message?: string) {
    super(message ?? `Not found: ${target}`);
    this.name = "NotFoundError";
    this.target = target;
  }
}

/**
 * Error thrown when an operation would overwrite a directory that is not
 * a dataset (it exists but has no index file).
 */
export class ConflictError extends Error {
  public readonly path: string;

  constructor(path: string, message?: string) {
    super(message ?? `Refusing to overwrite non-dataset path: ${path}`);
    this.name = "ConflictError";
    this.path = path;
  }
}

/**
 * Error thrown for invalid input: an unsupported storage format, an unsafe
 * table name, a malformed metadata document or inconsistent table columns.
 */
export class ValidationError extends Error {
  public readonly detail: string;

  constructor(detail: string) {
    super(`Validation failed: ${detail}`);
    this.name = "ValidationError";
    this.detail = detail;
  }
}

/**
 * Error thrown when a metadata field would shadow a built-in member of the
 * class its accessors are installed on.
 */
export class MetadataFieldCollisionError extends Error {
  public readonly field: string;

  constructor(field: string) {
    super(`Metadata field "${field}" would overwrite a Dataset built-in`);
    this.name = "MetadataFieldCollisionError";
    this.field = field;
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}
