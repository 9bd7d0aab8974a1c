// src/errorHelpers.ts - Error handling utilities

/**
 * Error caused by input the user can fix (bad option, missing file, unknown
 * command). The CLI prints its message without a stack trace.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Type guard for errors with a message property
 */
export function isErrorWithMessage(error: unknown): error is { message: string } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/** Type guard for Node.js file system errors */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (!isNodeError(error)) {
    return { message: getErrorMessage(error) };
  }

  return {
    message: error.message,
    code: error.code,
    path: error.path,
    syscall: error.syscall,
  };
}

/**
 * Format an error for the command line, prefixed with the program name
 */
export function formatCliError(programName: string, error: unknown): string {
  const message = getErrorMessage(error);

  if (error instanceof UsageError) {
    return `${programName}: ${message}`;
  }

  const details = getErrorDetails(error);
  if (details.code) {
    return `${programName} error: ${message} (${String(details.code)})`;
  }

  return `${programName} error: ${message}`;
}
