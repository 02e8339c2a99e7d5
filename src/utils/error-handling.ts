/**
 * @file Utility functions for type-safe error handling throughout the application.
 *       Provides consistent error formatting, the error kinds raised at each unit of work
 *       (run, repository, commit) and a small Result type for contract boundaries.
 */

import type { Workspace } from '../types';

/**
 * Safely extracts error message from unknown error type
 * @param error - The error object (unknown type)
 * @returns A string representation of the error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return String(error);
}

/**
 * Safely extracts error stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }

  if (error && typeof error === 'object' && 'stack' in error) {
    return String(error.stack);
  }

  return undefined;
}

/**
 * Formats error for logging with consistent structure
 */
export function formatError(error: unknown): { message: string; stack?: string } {
  return {
    message: getErrorMessage(error),
    stack: getErrorStack(error),
  };
}

/**
 * Safely logs error with consistent formatting
 * @param logger - Logger instance with error method
 * @param message - Log message
 * @param error - The error object (unknown type)
 * @param additionalContext - Additional context to include
 */
export function logError(
  logger: { error: (message: string, context?: Record<string, unknown>) => void },
  message: string,
  error: unknown,
  additionalContext?: Record<string, unknown>
): void {
  const errorInfo = formatError(error);
  logger.error(message, {
    error: errorInfo.message,
    stack: errorInfo.stack,
    ...additionalContext,
  });
}

/**
 * Fatal to the whole run: the GitHub token is missing or rejected.
 */
export class CredentialsError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'CredentialsError';
  }
}

/**
 * Fatal to the whole run: the repository search endpoint answered with a non-success status.
 */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    public readonly page: number,
    public readonly status?: number,
    public readonly originalError?: unknown
  ) {
    super(`Repository search failed on page ${page}: ${message}`);
    this.name = 'DiscoveryError';
  }
}

/**
 * Fatal to one repository: the input URL does not name an owner and a repository.
 */
export class InvalidRepositoryUrlError extends Error {
  constructor(public readonly url: string) {
    super(`Cannot derive owner and repository name from URL: ${url}`);
    this.name = 'InvalidRepositoryUrlError';
  }
}

/**
 * Fatal to one repository. Carries the partially created workspace, if any, so the
 * caller can release it.
 */
export class CloneError extends Error {
  constructor(
    public readonly cloneUrl: string,
    message: string,
    public readonly workspace?: Workspace,
    public readonly originalError?: unknown
  ) {
    super(`Failed to clone ${cloneUrl}: ${message}`);
    this.name = 'CloneError';
  }
}

/**
 * Commit-local: the workspace could not be moved to the commit.
 */
export class CheckoutError extends Error {
  constructor(
    public readonly commitHash: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to check out ${commitHash}: ${message}`);
    this.name = 'CheckoutError';
  }
}

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
