import axios from 'axios';

export type ServiceName = 'notion' | 'spotify';

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing configuration: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ApiError extends Error {
  readonly service: ServiceName;
  readonly status: number | null;
  readonly code: string | null;

  constructor(service: ServiceName, message: string, status: number | null = null, code: string | null = null) {
    super(message);
    this.name = 'ApiError';
    this.service = service;
    this.status = status;
    this.code = code;
  }
}

export class RateLimitError extends ApiError {
  /** Seconds, from the Retry-After header when present */
  readonly retryAfter: number | null;

  constructor(service: ServiceName, message: string, retryAfter: number | null = null) {
    super(service, message, 429, 'rate_limited');
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class OperationInProgressError extends Error {
  readonly running: string;

  constructor(running: string) {
    super(`Another operation is already running: ${running}`);
    this.name = 'OperationInProgressError';
    this.running = running;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

// Notion: { code, message }. Spotify API: { error: { status, message } }.
// Spotify accounts: { error, error_description }.
function describeBody(body: unknown): { message: string | null; code: string | null } {
  if (!isRecord(body)) {
    return { message: readString(body), code: null };
  }

  if (isRecord(body.error)) {
    return { message: readString(body.error.message), code: null };
  }

  return {
    message: readString(body.message) ?? readString(body.error_description),
    code: readString(body.code) ?? readString(body.error),
  };
}

function parseRetryAfter(value: unknown): number | null {
  const seconds = typeof value === 'string' || typeof value === 'number' ? Number(value) : NaN;
  return Number.isFinite(seconds) ? seconds : null;
}

export function toApiError(service: ServiceName, error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  const label = service === 'notion' ? 'Notion' : 'Spotify';

  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const { message, code } = describeBody(error.response?.data);
    const detail = message || error.message;

    if (status === 429) {
      const headers: unknown = error.response?.headers;
      const retryAfter = isRecord(headers) ? parseRetryAfter(headers['retry-after']) : null;
      return new RateLimitError(service, `${label} rate limit exceeded: ${detail}`, retryAfter);
    }

    return new ApiError(
      service,
      `${label} request failed${status ? ` (${status})` : ''}: ${detail}`,
      status,
      code ?? error.code ?? null
    );
  }

  return new ApiError(service, `${label} request failed: ${errorMessage(error)}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
