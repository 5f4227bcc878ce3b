/**
 * Error raised by request handling with the HTTP status it should produce
 */
export class ApiError extends Error {
  statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Status code for an error thrown while answering a request. Lookups that
 * fail with "not found" map to 404, other errors to 400.
 */
export function getStatusCode(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof Error) {
    return error.message.includes('not found') ? 404 : 400;
  }
  return 500;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
