import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import {
  ApiError,
  ConfigurationError,
  OperationInProgressError,
  RateLimitError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';

export function zodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function statusCodeFor(error: unknown): number {
  if (error instanceof ZodError || error instanceof ValidationError) return 400;
  if (error instanceof OperationInProgressError) return 409;
  if (error instanceof RateLimitError) return 429;
  if (error instanceof ConfigurationError) return 503;
  if (error instanceof ApiError) return 502;
  return 500;
}

export function sendError(reply: FastifyReply, label: string, error: unknown) {
  const statusCode = statusCodeFor(error);
  const body: Record<string, unknown> = {
    error: label,
    message: errorMessage(error),
  };

  if (error instanceof ZodError) {
    body.message = 'Invalid request';
    body.issues = zodIssues(error);
  } else if (error instanceof ValidationError && error.issues.length > 0) {
    body.issues = error.issues;
  } else if (error instanceof ConfigurationError) {
    body.missing = error.missing;
  } else if (error instanceof RateLimitError && error.retryAfter !== null) {
    reply.header('Retry-After', String(error.retryAfter));
  }

  if (statusCode >= 500) {
    reply.log.error({ err: error }, label);
  }

  return reply.code(statusCode).send(body);
}
