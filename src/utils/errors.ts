/**
 * @fileoverview Error taxonomy shared by every command.
 *
 * Each user-facing failure maps to exactly one error type in the JSON
 * envelope:
 * - MissingCredentials: setup not done (secrets or token file absent)
 * - AuthenticationError: token invalid, expired or unrefreshable
 * - ValidationError: malformed input, detected before any network call
 * - SearchError / SendError / LabelError: the provider rejected the call
 */

import { isRetryableStatus } from '../domains/google-core/service/retry-policy.js';

export type ErrorType =
  | 'MissingCredentials'
  | 'AuthenticationError'
  | 'SearchError'
  | 'SendError'
  | 'LabelError'
  | 'ValidationError';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Base for the errors that surface in the envelope. */
export abstract class CliError extends AppError {
  abstract readonly errorType: ErrorType;
}

export class MissingCredentialsError extends CliError {
  readonly errorType = 'MissingCredentials';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MissingCredentials', false, context);
    this.name = 'MissingCredentialsError';
  }
}

export class AuthenticationError extends CliError {
  readonly errorType = 'AuthenticationError';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AuthenticationError', false, context);
    this.name = 'AuthenticationError';
  }
}

export class ValidationError extends CliError {
  readonly errorType = 'ValidationError';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ValidationError', false, context);
    this.name = 'ValidationError';
  }
}

export class SearchError extends CliError {
  readonly errorType = 'SearchError';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SearchError', false, context);
    this.name = 'SearchError';
  }
}

export class SendError extends CliError {
  readonly errorType = 'SendError';

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SendError', false, context);
    this.name = 'SendError';
  }
}

/** Reason a label operation was refused. */
export type LabelErrorReason = 'notFound' | 'conflict' | 'rejected';

export class LabelError extends CliError {
  readonly errorType = 'LabelError';

  constructor(
    message: string,
    public readonly reason: LabelErrorReason = 'rejected',
    context?: Record<string, unknown>
  ) {
    super(message, 'LabelError', false, context);
    this.name = 'LabelError';
  }
}

/**
 * Failure reported by the Gmail API, decoded at the gateway boundary.
 * Never reaches the envelope directly: services translate it into one of
 * the CliError subclasses above.
 */
export class GmailApiError extends AppError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    context?: Record<string, unknown>
  ) {
    super(message, 'GmailApiError', isRetryableStatus(status), context);
    this.name = 'GmailApiError';
  }
}

/** Uniform error envelope printed on stdout. */
export interface ErrorEnvelope {
  status: 'error';
  error_type: ErrorType;
  message: string;
}

/**
 * Convert any thrown value into the error envelope.
 * Errors outside the taxonomy are reported under `fallback`, the error type
 * of the command that was running.
 */
export function toErrorEnvelope(error: unknown, fallback: ErrorType): ErrorEnvelope {
  if (error instanceof CliError) {
    return { status: 'error', error_type: error.errorType, message: error.message };
  }
  return {
    status: 'error',
    error_type: fallback,
    message: error instanceof Error ? error.message : String(error),
  };
}

/** Message text of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
