/** Error taxonomy for the importer. Everything fatal extends ImporterError. */

export class ImporterError extends Error {
  constructor(
    message: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "ImporterError";
  }
}

export class ConfigurationError extends ImporterError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class CSVError extends ImporterError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CSVError";
  }
}

export class APIError extends ImporterError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "APIError";
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, cause?: unknown) {
    super(message, 401, cause);
    this.name = "AuthenticationError";
  }
}

export class ResourceNotFoundError extends APIError {
  constructor(message: string, cause?: unknown) {
    super(message, 404, cause);
    this.name = "ResourceNotFoundError";
  }
}

/** Human-readable line for a fatal error, prefixed by its category. */
export function describeFailure(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  // Subclasses first: AuthenticationError is also an APIError.
  if (e instanceof ConfigurationError) return `Configuration error: ${msg}`;
  if (e instanceof AuthenticationError) return `Authentication error: ${msg}`;
  if (e instanceof ResourceNotFoundError) return `Resource not found: ${msg}`;
  if (e instanceof APIError) return `API error: ${msg}`;
  if (e instanceof CSVError) return `CSV error: ${msg}`;
  if (e instanceof ImporterError) return `Error: ${msg}`;
  return `Unexpected error: ${msg}`;
}
