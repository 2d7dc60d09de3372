export type GieErrorCode = "CONFIGURATION" | "VALIDATION";

export class GieClientError extends Error {
  public readonly code: GieErrorCode;

  constructor(options: { code: GieErrorCode; message: string }) {
    super(options.message);
    this.name = "GieClientError";
    this.code = options.code;
  }
}

/**
 * Raised while building a client: missing credential, a session whose `x-key`
 * header disagrees with the credential, or an unusable environment.
 */
export class ConfigurationError extends GieClientError {
  public readonly details?: Record<string, string[]>;

  constructor(message: string, details?: Record<string, string[]>) {
    super({ code: "CONFIGURATION", message });
    this.name = "ConfigurationError";
    this.details = details;
  }
}

/** Raised before any network I/O when query parameters break a rule. */
export class ValidationError extends GieClientError {
  public readonly field: string;
  public readonly allowed?: readonly unknown[];

  constructor(options: { field: string; message: string; allowed?: readonly unknown[] }) {
    super({ code: "VALIDATION", message: options.message });
    this.name = "ValidationError";
    this.field = options.field;
    this.allowed = options.allowed;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
