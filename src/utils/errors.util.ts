/**
 * Malformed external configuration. Callers recover by keeping the defaults.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The batch could not list its input (missing path, not a directory, no permission).
 * Raised before any file is touched.
 */
export class ListingError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly code?: string
  ) {
    super(message);
    this.name = 'ListingError';
  }
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

/**
 * Errors raised by Node's own modules may come from another realm (as under Jest),
 * so their shape is checked instead of `instanceof Error`.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
