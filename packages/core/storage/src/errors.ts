/**
 * Error types for storage operations
 */

export type StorageError =
  | { type: 'not_found'; resource: string; id: string }
  | { type: 'payload_missing'; uri: string; path: string }
  | { type: 'validation'; field: string; message: string }
  | { type: 'io'; message: string; path?: string; cause?: unknown };

/**
 * Result type for storage operations
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Human-readable message for a storage error
 */
export function describeStorageError(error: StorageError): string {
  switch (error.type) {
    case 'not_found':
      return `Resource not found: ${error.id}`;
    case 'payload_missing':
      return `Resource file not found: ${error.uri} (path: ${error.path})`;
    case 'validation':
      return `Invalid ${error.field}: ${error.message}`;
    case 'io':
      return error.path ? `${error.message} (path: ${error.path})` : error.message;
  }
}

/**
 * Node error code, when the thrown value carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
