export abstract class SearchApiError extends Error {
  abstract readonly fatal: boolean;

  constructor(
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
  }
}

export class AuthenticationError extends SearchApiError {
  readonly fatal = true;

  constructor(status: number, body: string) {
    super(createErrorMessage("Search API rejected the credentials", status, body), status);
    this.name = "AuthenticationError";
  }
}

export class IndexNotFoundError extends SearchApiError {
  readonly fatal = true;

  constructor(indexName: string, body: string) {
    super(createErrorMessage(`Index "${indexName}" does not exist`, 404, body), 404);
    this.name = "IndexNotFoundError";
  }
}

export class RemoteRequestError extends SearchApiError {
  readonly fatal = true;

  constructor(status: number, body: string) {
    super(createErrorMessage("Search API request failed", status, body), status);
    this.name = "RemoteRequestError";
  }
}

export class TransientServiceError extends SearchApiError {
  readonly fatal = false;

  constructor(message: string, status: number | null = null) {
    super(message, status);
    this.name = "TransientServiceError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Search API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

function createErrorMessage(prefix: string, status: number, body: string): string {
  if (!body) {
    return `${prefix} (status ${status})`;
  }

  return `${prefix} (status ${status}): ${body}`;
}

export function isFatalError(error: unknown): boolean {
  if (error instanceof SearchApiError) {
    return error.fatal;
  }

  return true;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
