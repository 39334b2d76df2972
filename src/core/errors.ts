/**
 * Base error class for all adapter errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class EngageBridgeError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'EngageBridgeError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when a caller breaks an input contract (missing request, bot, activities...). */
export class ValidationError extends EngageBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'INVALID_ARGUMENT',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown for operations the platform integration does not offer. */
export class NotSupportedError extends EngageBridgeError {
  constructor(operation: string) {
    super({
      message: `Operation "${operation}" is not supported by the Engage adapter`,
      code: 'NOT_SUPPORTED',
      statusCode: 501,
      context: { operation },
    });
    this.name = 'NotSupportedError';
  }
}

/** Thrown when an Engage REST API call fails. */
export class PlatformApiError extends EngageBridgeError {
  /** HTTP status returned by the platform. */
  public readonly status: number;

  constructor(path: string, status: number, message: string, cause?: Error) {
    super({
      message: `Engage API error ${String(status)} on ${path}: ${message}`,
      code: 'PLATFORM_API_ERROR',
      statusCode: 502,
      cause,
      context: { path, status },
    });
    this.status = status;
    this.name = 'PlatformApiError';
  }
}
