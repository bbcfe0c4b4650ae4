/**
 * Error Classes for SDN Lookup Service
 *
 * RFC 7807 Problem Details format:
 * {
 *   type: string (URI reference)
 *   title: string
 *   status: number
 *   detail: string
 *   instance: string (request ID)
 *   ...extensions
 * }
 */

// =============================================================================
// TYPES
// =============================================================================

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  code: string;
  timestamp: string;
  [extension: string]: unknown;
}

export interface FieldError {
  field: string;
  message: string;
  code?: string;
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly type: string;
  public readonly title: string;
  public readonly detail: string;
  public readonly timestamp: string;
  public readonly requestId?: string;

  constructor(params: {
    code: string;
    statusCode: number;
    message: string;
    type?: string;
    title?: string;
    detail?: string;
    isOperational?: boolean;
    requestId?: string;
    cause?: unknown;
  }) {
    super(params.message);

    this.name = new.target.name;
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.type = params.type || `urn:error:sdn-lookup-service:${params.code.toLowerCase().replace(/_/g, '-')}`;
    this.title = params.title || params.message;
    this.detail = params.detail || params.message;
    this.isOperational = params.isOperational ?? true;
    this.timestamp = new Date().toISOString();
    this.requestId = params.requestId;

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (params.cause !== undefined) {
      this.cause = params.cause;
    }
  }

  /**
   * Convert to RFC 7807 Problem Details format
   */
  toRFC7807(instance?: string): ProblemDetails {
    return {
      type: this.type,
      title: this.title,
      status: this.statusCode,
      detail: this.detail,
      instance: instance || this.requestId,
      code: this.code,
      timestamp: this.timestamp
    };
  }
}

// =============================================================================
// VALIDATION ERRORS
// =============================================================================

export class ValidationError extends BaseError {
  public readonly validationErrors?: FieldError[];

  constructor(params: {
    message: string;
    validationErrors?: FieldError[];
    requestId?: string;
  }) {
    super({
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      message: params.message,
      title: 'Validation Error',
      detail: params.message,
      requestId: params.requestId
    });
    this.validationErrors = params.validationErrors;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      validationErrors: this.validationErrors
    };
  }
}

/**
 * Client errors raised by the HTTP framework itself (malformed request line,
 * unsupported media type), keeping the status the framework chose.
 */
export class BadRequestError extends BaseError {
  constructor(message: string, statusCode: number = 400, requestId?: string) {
    super({
      code: 'BAD_REQUEST',
      statusCode,
      message,
      title: 'Bad Request',
      requestId
    });
  }
}

// =============================================================================
// NOT FOUND ERRORS
// =============================================================================

export class NotFoundError extends BaseError {
  public readonly resource: string;

  constructor(resource: string, requestId?: string) {
    super({
      code: 'NOT_FOUND',
      statusCode: 404,
      message: `${resource} not found`,
      title: 'Resource Not Found',
      requestId
    });
    this.resource = resource;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      resource: this.resource
    };
  }
}

// =============================================================================
// DATASET ERRORS
// =============================================================================

export type FetchFailureReason = 'network' | 'status' | 'timeout' | 'io';

/**
 * Upstream dataset could not be retrieved. Raised by the fetchers and absorbed
 * by the refresh coordinator while a previous snapshot exists.
 */
export class FetchError extends BaseError {
  public readonly source: string;
  public readonly reason: FetchFailureReason;
  public readonly upstreamStatus?: number;

  constructor(params: {
    source: string;
    reason: FetchFailureReason;
    message: string;
    upstreamStatus?: number;
    cause?: unknown;
  }) {
    super({
      code: 'SDN_FETCH_ERROR',
      statusCode: 502,
      message: params.message,
      title: 'Dataset Fetch Failed',
      cause: params.cause
    });
    this.source = params.source;
    this.reason = params.reason;
    this.upstreamStatus = params.upstreamStatus;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      reason: this.reason,
      upstreamStatus: this.upstreamStatus
    };
  }
}

/**
 * Dataset bytes were retrieved but do not match the expected CSV schema.
 */
export class ParseError extends BaseError {
  public readonly line?: number;

  constructor(message: string, options: { line?: number; cause?: unknown } = {}) {
    super({
      code: 'SDN_PARSE_ERROR',
      statusCode: 502,
      message,
      title: 'Dataset Parse Failed',
      cause: options.cause
    });
    this.line = options.line;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      line: this.line
    };
  }
}

export class NoDataError extends BaseError {
  public readonly lastRefreshError?: string;

  constructor(lastRefreshError?: string, requestId?: string) {
    super({
      code: 'SDN_NO_DATA',
      statusCode: 503,
      message: 'Sanctions dataset is not available yet',
      title: 'Service Unavailable',
      // The refresh error can name local paths; it stays in logs and /healthz
      detail: lastRefreshError
        ? 'Sanctions dataset is not available yet: the last refresh failed'
        : 'Sanctions dataset is not available yet',
      requestId
    });
    this.lastRefreshError = lastRefreshError;
  }
}

// =============================================================================
// CONFIGURATION & INTERNAL ERRORS
// =============================================================================

export class ConfigurationError extends BaseError {
  public readonly issues: FieldError[];

  constructor(issues: FieldError[]) {
    super({
      code: 'CONFIGURATION_ERROR',
      statusCode: 500,
      message: `Invalid configuration: ${issues.map(issue => `${issue.field} (${issue.message})`).join(', ')}`,
      title: 'Configuration Error',
      isOperational: false
    });
    this.issues = issues;
  }
}

export class InternalError extends BaseError {
  constructor(message: string = 'An unexpected error occurred', requestId?: string, cause?: unknown) {
    super({
      code: 'INTERNAL_ERROR',
      statusCode: 500,
      message,
      title: 'Internal Server Error',
      isOperational: false,
      requestId,
      cause
    });
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Convert unknown error to BaseError
 */
export function toBaseError(error: unknown, requestId?: string): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, requestId, error);
  }

  return new InternalError(String(error), requestId);
}

/**
 * Message of any thrown value, for logs and recorded refresh state
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
