export class AppError extends Error {
  readonly status: number;
  readonly details?: string;

  constructor(message: string, status = 500, details?: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, status = 500) {
    super(message, status);
  }
}

export class DataLoadError extends AppError {
  constructor(message: string, details?: string) {
    super(message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class SheetsError extends AppError {}

export class SearchError extends AppError {
  constructor(message: string, details?: string) {
    super(message, 502, details);
  }
}

export type LlmErrorKind = 'authentication' | 'rate_limit' | 'api';

const LLM_ERROR_STATUS: Record<LlmErrorKind, number> = {
  authentication: 401,
  rate_limit: 429,
  api: 502,
};

export class LlmError extends AppError {
  readonly kind: LlmErrorKind;

  constructor(kind: LlmErrorKind, message: string, details?: string) {
    super(message, LLM_ERROR_STATUS[kind], details);
    this.kind = kind;
  }
}

/**
 * Reads the HTTP status off an error thrown by an API client. SDK errors carry
 * it as `status`; gaxios and axios errors keep it under `response.status`.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
