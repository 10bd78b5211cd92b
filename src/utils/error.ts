import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { logger } from './logger.js';
import { renderErrorPage } from '../views/error.view.js';

export class AppError extends Error {
  constructor(
    public code: string,
    public message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(public readonly videoId: string) {
    super('VIDEO_NOT_FOUND', 'Video not found', 404);
    this.name = 'NotFoundError';
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(public readonly issues: FieldIssue[]) {
    super('VALIDATION_ERROR', issues.map((issue) => issue.message).join('. '), 400);
    this.name = 'ValidationError';
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super('STORAGE_ERROR', message, 500);
    this.name = 'StorageError';
  }
}

/**
 * 4xx errors raised by Fastify plugins, e.g. an oversized multipart upload
 */
export function isClientError(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * JSON for the API and health check, HTML pages for everything else
 */
export function wantsJson(request: FastifyRequest): boolean {
  return request.url.startsWith('/api/') || request.url.startsWith('/health');
}

export async function errorHandler(
  error: FastifyError | AppError,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const statusCode = error.statusCode || 500;

  // Log error with context
  const logData = {
    error: error.message,
    stack: error.stack,
    url: request.url,
    method: request.method,
    statusCode,
  };
  if (statusCode >= 500) {
    logger.error(logData);
  } else {
    logger.warn(logData);
  }

  const json = wantsJson(request);

  // Handle AppError
  if (error instanceof AppError) {
    if (!json) {
      await reply
        .status(error.statusCode)
        .type('text/html; charset=utf-8')
        .send(renderErrorPage(error.statusCode, error.message));
      return;
    }

    await reply.status(error.statusCode).send({
      error: error.code,
      message: error.message,
      ...(error instanceof ValidationError ? { details: error.issues } : {}),
      statusCode: error.statusCode,
    });
    return;
  }

  // Handle Fastify validation errors
  if (error.validation) {
    await reply.status(400).send({
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: error.validation,
      statusCode: 400,
    });
    return;
  }

  // Handle generic errors; client errors raised by plugins (oversized upload, bad content type) keep their message
  const message =
    statusCode < 500 || request.server.appConfig.nodeEnv === 'development'
      ? error.message
      : 'An unexpected error occurred';

  if (!json) {
    await reply.status(statusCode).type('text/html; charset=utf-8').send(renderErrorPage(statusCode, message));
    return;
  }

  await reply.status(statusCode).send({
    error: statusCode < 500 ? error.code || 'REQUEST_ERROR' : 'INTERNAL_ERROR',
    message,
    statusCode,
  });
}

export async function notFoundHandler(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  if (wantsJson(request)) {
    await reply.status(404).send({
      error: 'ROUTE_NOT_FOUND',
      message: `Route ${request.method} ${request.url} not found`,
      statusCode: 404,
    });
    return;
  }

  await reply.status(404).type('text/html; charset=utf-8').send(renderErrorPage(404, 'Page not found'));
}
