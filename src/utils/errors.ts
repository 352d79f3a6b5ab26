/**
 * Base error for everything the guard raises on purpose.
 *
 * `code` is a stable machine-readable identifier; `statusCode` is the HTTP
 * status an adapter should answer with when the error reaches a request
 * boundary.
 */
export class GuardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GuardError';
  }
}

/**
 * Thrown by configuration loading when a required setting is missing.
 */
export class ConfigurationError extends GuardError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Render any thrown value as a single-line description.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
