export type CatalogErrorCode =
  | 'INVALID_QUERY'
  | 'INVALID_ARGUMENTS'
  | 'TOOL_NOT_FOUND'
  | 'MODEL_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'SCHEMA_MISMATCH';

/**
 * Base class for every failure the search path reports on purpose.
 * `retryable` tells the caller whether the same request may succeed later.
 */
export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: CatalogErrorCode;
    message: string;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    if (options.details) {
      this.details = options.details;
    }
  }
}

export class InvalidQueryError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'INVALID_QUERY', message, details });
  }
}

export class InvalidArgumentsError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'INVALID_ARGUMENTS', message, details });
  }
}

export class ToolNotFoundError extends CatalogError {
  constructor(toolName: string) {
    super({ code: 'TOOL_NOT_FOUND', message: `Unknown tool: ${toolName}`, details: { toolName } });
  }
}

/** Embedding backend failed to load (fatal at startup) or timed out / failed per request (retryable). */
export class ModelUnavailableError extends CatalogError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super({ code: 'MODEL_UNAVAILABLE', message, retryable: options.retryable ?? false, cause: options.cause });
  }
}

export class StoreUnavailableError extends CatalogError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super({ code: 'STORE_UNAVAILABLE', message, retryable: true, cause: options.cause });
  }
}

export class SchemaMismatchError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'SCHEMA_MISMATCH', message, details });
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
