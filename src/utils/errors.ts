/**
 * Base class for errors raised by the auditor.
 * Operational errors are expected failures (bad input, unreachable hosts);
 * anything else is a programming error.
 */
export class AppError extends Error {
  readonly code: string;
  readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised before any crawl starts when the run cannot be configured,
 * e.g. an unreadable site list or an invalid environment value.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

export type NavigationFailureKind = 'http-status' | 'no-response' | 'timeout' | 'connection';

/**
 * A page could not be loaded. Page-level and never fatal to a site crawl.
 */
export class NavigationError extends AppError {
  readonly kind: NavigationFailureKind;
  /** Last observed HTTP status, 0 when the failure happened below HTTP */
  readonly status: number;

  constructor(message: string, kind: NavigationFailureKind, status = 0) {
    super(message, 'NAVIGATION_ERROR');
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Formats an unknown thrown value for log output.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
