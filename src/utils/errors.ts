/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * External API error (PriceCharting, Frankfurter, Gemini)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;

  constructor(
    service: string,
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {},
  ) {
    super(`${service} API error: ${message}`, {
      code: options.code || 'EXTERNAL_API_ERROR',
      statusCode: options.statusCode || 502,
      isOperational: true,
      context: { service, ...options.context },
      cause: options.cause,
    });
    this.service = service;
  }
}

/**
 * A price source timed out, failed, or had nothing for the query.
 * Never surfaced to callers: the next source tier takes over.
 */
export class SourceUnavailableError extends ExternalApiError {
  constructor(source: string, message: string, cause?: unknown) {
    super(source, message, { code: 'SOURCE_UNAVAILABLE', cause });
  }
}

/**
 * The disambiguation oracle failed or returned no usable verdict.
 */
export class OracleFailureError extends ExternalApiError {
  constructor(message: string, cause?: unknown) {
    super('Oracle', message, { code: 'ORACLE_FAILURE', cause });
  }
}

/**
 * The live exchange rate could not be obtained.
 */
export class CurrencyUnavailableError extends ExternalApiError {
  constructor(message: string, cause?: unknown) {
    super('Exchange rate', message, { code: 'CURRENCY_UNAVAILABLE', cause });
  }
}

/**
 * Database write/read failure
 */
export class PersistenceError extends AppError {
  constructor(operation: string, message: string, cause?: unknown) {
    super(`Database ${operation} failed: ${message}`, {
      code: 'PERSISTENCE_ERROR',
      statusCode: 500,
      isOperational: false,
      context: { operation },
      cause,
    });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, missingFields?: string[]) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      statusCode: 500,
      isOperational: false,
      context: { missingFields },
    });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      isOperational: error.isOperational,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
    };
  }

  return { message: getErrorMessage(error) };
}
