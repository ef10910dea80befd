import type { FastifyError, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';

import { getLogger } from './logger';
import type { ErrorResponse } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');
export const notFoundError = errorFactory(404, 'not_found');
export const unavailableError = errorFactory(503, 'unavailable');

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

function isFastifyValidationError(err: unknown): err is FastifyError & { validation: unknown[] } {
  return err instanceof Error && 'validation' in err && Array.isArray(err.validation);
}

export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        details: err.details
      }
    };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: 'Request validation failed.',
        details: {
          issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
        }
      }
    };
  }

  if (isFastifyValidationError(err)) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: err.message
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        code: 'internal',
        message: 'An unexpected error occurred.'
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: 'Unknown error.'
    }
  };
}

function shouldLogError(statusCode: number): boolean {
  return statusCode >= 500;
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (shouldLogError(sanitized.statusCode)) {
      logger.error({ err, requestId }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});

export interface CircuitBreakerOptions {
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
}

export type CircuitBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitBreaker {
  private state: CircuitBreakerState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private nextAttempt = Date.now();

  constructor(private readonly options: CircuitBreakerOptions) {}

  public getState(): CircuitBreakerState {
    return this.state;
  }

  public async exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() >= this.nextAttempt) {
        this.state = 'HALF_OPEN';
      } else {
        throw unavailableError('Circuit breaker is open.');
      }
    }

    try {
      const result = await action();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount += 1;
      if (this.successCount >= this.options.successThreshold) {
        this.reset();
      }
    } else {
      this.reset();
    }
  }

  private onFailure(): void {
    this.failureCount += 1;

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.options.failureThreshold) {
      this.trip();
    }
  }

  private reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.state = 'CLOSED';
  }

  private trip(): void {
    this.state = 'OPEN';
    this.successCount = 0;
    this.nextAttempt = Date.now() + this.options.timeoutMs;
  }
}

export interface RetryOptions {
  retries: number;
  factor?: number;
  minTimeoutMs?: number;
}

export async function withRetry<T>(fn: () => Promise<T>, { retries, factor = 2, minTimeoutMs = 200 }: RetryOptions): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === retries) {
        break;
      }

      const wait = minTimeoutMs * Math.pow(factor, attempt);
      await new Promise((resolve) => setTimeout(resolve, wait));
      attempt += 1;
    }
  }

  throw lastError;
}
