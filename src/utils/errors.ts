/**
 * Application errors
 *
 * Each error carries the HTTP status the API answers with.
 */

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * A navigation that failed or answered with an error status
 */
export class FetchError extends AppError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, message?: string) {
    super(message ?? `Fetch failed (${status ?? 'no response'}) for ${url}`, 502);
    this.url = url;
    this.status = status;
  }

  /** Client errors won't change on retry, except timeouts and throttling */
  get retryable(): boolean {
    if (this.status === null) return true;
    if (this.status === 408 || this.status === 429) return true;
    return this.status < 400 || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
