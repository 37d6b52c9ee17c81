/**
 * Error taxonomy for the assistant
 */

export class AssistantError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AssistantError';
  }
}

export class ConfigError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** Bad tool arguments or unparseable user input */
export class ValidationError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class SourceUnavailableError extends AssistantError {
  constructor(
    public readonly sourceName: string,
    message: string,
    cause?: unknown
  ) {
    super(message, 'SOURCE_UNAVAILABLE', cause);
    this.name = 'SourceUnavailableError';
  }
}

export class NotFoundError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NOT_FOUND', cause);
    this.name = 'NotFoundError';
  }
}

export class ProviderTransientError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROVIDER_TRANSIENT', cause);
    this.name = 'ProviderTransientError';
  }
}

/** Auth or permission failure; never retried */
export class ProviderFatalError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROVIDER_FATAL', cause);
    this.name = 'ProviderFatalError';
  }
}

/** Raised locally when a run outlives the poll budget */
export class TimeoutError extends AssistantError {
  constructor(message: string, public readonly runId?: string) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class ConcurrencyConflictError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONCURRENCY_CONFLICT', cause);
    this.name = 'ConcurrencyConflictError';
  }
}

/**
 * Pull an HTTP status out of whatever the vendor SDK threw.
 * OpenAI's APIError carries `status`; gaxios errors carry `response.status` or a numeric `code`.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const ACTIVE_RUN_PATTERN = /while a run .* is active/i;

/**
 * Map a vendor failure onto the taxonomy. Already-classified errors pass through.
 */
export function classifyProviderError(error: unknown, context: string): AssistantError {
  if (error instanceof AssistantError) return error;

  const status = httpStatusOf(error);
  const detail = `${context}: ${errorMessage(error)}`;

  if (status === 404) return new NotFoundError(detail, error);
  if (status === 401 || status === 403) return new ProviderFatalError(detail, error);
  if (status === 400 && ACTIVE_RUN_PATTERN.test(errorMessage(error))) {
    return new ProviderTransientError(detail, error);
  }
  if (status === undefined || status === 408 || status === 409 || status === 429 || status >= 500) {
    return new ProviderTransientError(detail, error);
  }
  return new ProviderFatalError(detail, error);
}
