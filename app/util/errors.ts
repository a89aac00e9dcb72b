/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

export class HttpError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'The requested resource could not be found') {
    super(404, message);
  }
}

export class ServerError extends HttpError {
  constructor(message = 'An unexpected error occurred') {
    super(500, message);
  }
}

export class RequestValidationError extends HttpError {
  constructor(message = 'Invalid request') {
    super(400, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message = 'Conflict error') {
    super(409, message);
  }
}

/**
 * Raised when the API is assembled from an inconsistent configuration, e.g. request models of
 * mixed kinds or an invalid environment. Not recoverable by retrying.
 */
export class ConfigurationError extends Error {}

export interface JsonErrorResponse {
  code: string;
  description: string;
}

/**
 * Returns the HTTP status code to use for the given error
 *
 * @param error - The error that occurred
 * @returns the status code, 500 for anything that is not an HttpError with a valid code
 */
export function getHttpStatusCode(error: Error): number {
  if (error instanceof HttpError && error.code >= 400 && error.code < 600) {
    return error.code;
  }
  return 500;
}

/**
 * Returns the message safe to show an end user. Messages from errors that are not
 * HttpErrors may contain backend internals, so they are replaced.
 *
 * @param error - The error that occurred
 * @returns the message
 */
export function getEndUserErrorMessage(error: Error): string {
  if (error instanceof HttpError && error.message) {
    return error.message;
  }
  return 'Internal server error';
}

/**
 * Returns the value of the `code` field in a JSON error response, the name of the error class
 *
 * @param error - The error that occurred
 * @returns the code
 */
export function getCodeForError(error: Error): string {
  if (error instanceof HttpError) {
    return error.constructor.name;
  }
  return 'ServerError';
}

/**
 * Builds a STAC API error response body
 *
 * @param code - the error code, normally the error class name
 * @param message - the message for the end user
 * @returns the response body
 */
export function buildJsonErrorResponse(code: string, message: string): JsonErrorResponse {
  return { code, description: `Error: ${message}` };
}
