export const ErrorCodes = {
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  MALFORMED_OUTPUT: 'MALFORMED_OUTPUT',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ReviewPanelError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ReviewPanelError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

// Connection, auth, timeout or non-2xx failure talking to a backend.
export class BackendError extends ReviewPanelError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message, ErrorCodes.BACKEND_UNAVAILABLE, status === undefined ? undefined : { status });
    this.name = 'BackendError';
  }
}

export class MalformedOutputError extends ReviewPanelError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.MALFORMED_OUTPUT, details);
    this.name = 'MalformedOutputError';
  }
}

// Missing credentials or settings. Never absorbed: it must reach the caller.
export class ConfigurationError extends ReviewPanelError {
  constructor(message: string, missing: string[] = []) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, missing.length ? { missing } : undefined);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
