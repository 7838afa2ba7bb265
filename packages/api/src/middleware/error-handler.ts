import type { Context } from 'hono';
import { ZodError } from 'zod';
import {
  ChecksumMismatchError,
  EvaluationValidationError,
  LlmError,
  NotFoundError,
  PersistenceError,
  SchemaValidationError,
  UnapprovedInvoiceError,
} from '@tenet/shared/src/utils/errors.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof EvaluationValidationError || err instanceof UnapprovedInvoiceError) {
    log.info({ requestId, code: err.code, error: err.message }, 'Rejected request');
    const body: ErrorResponse = { error: err.message, code: err.code, requestId };
    return c.json(body, 422);
  }

  if (err instanceof ChecksumMismatchError) {
    log.warn(
      { requestId, expected: err.expected, actual: err.actual },
      'Invoice checksum mismatch',
    );
    const body: ErrorResponse = { error: err.message, code: err.code, requestId };
    return c.json(body, 409);
  }

  if (err instanceof NotFoundError) {
    const body: ErrorResponse = { error: err.message, code: err.code, requestId };
    return c.json(body, 404);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
