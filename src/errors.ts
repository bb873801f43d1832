/**
 * Error taxonomy for calls against the Exa API.
 *
 * Tools never let these escape: `formatErrorForLlm` turns each one into the
 * text that is handed back to the MCP client as a normal tool result.
 */

export class ExaError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ExaAuthenticationError extends ExaError {}

export class ExaNotFoundError extends ExaError {}

export class ExaRateLimitError extends ExaError {
  readonly retryAfter?: number;

  constructor(message = 'Rate limit exceeded', retryAfter?: number) {
    super(message, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

export class ExaServerError extends ExaError {}

/** Any other non-2xx status. */
export class ExaApiError extends ExaError {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message, { status });
    this.status = status;
  }
}

export class ExaValidationError extends ExaError {}

export class ExaTimeoutError extends ExaError {}

export class ExaConnectionError extends ExaError {}

export class ExaCancelledError extends ExaError {}

export function formatErrorForLlm(error: unknown): string {
  if (error instanceof ExaAuthenticationError) {
    return (
      'Error: Authentication failed. Please verify your EXA_API_KEY ' +
      'environment variable is set correctly. Get your key at dashboard.exa.ai'
    );
  }

  if (error instanceof ExaRateLimitError) {
    let message = 'Error: Rate limit exceeded. Please wait before making more requests.';
    if (error.retryAfter !== undefined) {
      message += ` Retry after ${error.retryAfter} seconds.`;
    }
    return message;
  }

  if (error instanceof ExaValidationError) {
    return `Error: Invalid input - ${error.message}. Please check your parameters.`;
  }

  if (error instanceof ExaNotFoundError) {
    return `Error: Resource not found - ${error.message}. Please verify the ID is correct.`;
  }

  if (error instanceof ExaServerError) {
    return `Error: Exa API server error. This is temporary - please try again. Details: ${error.message}`;
  }

  if (error instanceof ExaApiError) {
    return `Error: ${error.message}`;
  }

  if (error instanceof ExaTimeoutError) {
    return (
      'Error: Request timed out. The Exa API took too long to respond. ' +
      'Try reducing the number of results or simplifying your query.'
    );
  }

  if (error instanceof ExaConnectionError) {
    return 'Error: Could not connect to Exa API. Please check your internet connection.';
  }

  if (error instanceof ExaCancelledError) {
    return 'Error: Request was cancelled.';
  }

  if (error instanceof Error) {
    return `Error: ${error.name} - ${error.message}`;
  }

  return `Error: ${String(error)}`;
}
