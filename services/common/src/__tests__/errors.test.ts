import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { CircuitBreaker, ServiceError, badRequestError, notFoundError, sanitizeError, withRetry } from '../errors';

describe('sanitizeError', () => {
  it('keeps the status and payload of service errors', () => {
    const result = sanitizeError(badRequestError('Bad skills.', { field: 'skills' }));

    expect(result).toEqual({
      statusCode: 400,
      payload: { code: 'bad_request', message: 'Bad skills.', details: { field: 'skills' } }
    });
  });

  it('maps zod failures to bad_request with issue paths', () => {
    const parsed = z.object({ query: z.string() }).safeParse({});
    if (parsed.success) {
      throw new Error('expected validation to fail');
    }

    const result = sanitizeError(parsed.error);

    expect(result.statusCode).toBe(400);
    expect(result.payload.code).toBe('bad_request');
    expect(result.payload.message).toBe('Request validation failed.');
    expect(result.payload.details).toEqual({ issues: [{ path: 'query', message: 'Required' }] });
  });

  it('hides unexpected errors behind a 500', () => {
    expect(sanitizeError(new Error('database password leaked'))).toEqual({
      statusCode: 500,
      payload: { code: 'internal', message: 'An unexpected error occurred.' }
    });
  });

  it('handles thrown non-errors', () => {
    expect(sanitizeError('boom').payload.message).toBe('Unknown error.');
  });
});

describe('CircuitBreaker', () => {
  it('opens after consecutive failures and rejects without calling the action', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, timeoutMs: 60_000 });
    const failing = vi.fn().mockRejectedValue(new Error('down'));

    await expect(breaker.exec(failing)).rejects.toThrow('down');
    await expect(breaker.exec(failing)).rejects.toThrow('down');
    expect(breaker.getState()).toBe('OPEN');

    const action = vi.fn().mockResolvedValue('ok');
    await expect(breaker.exec(action)).rejects.toBeInstanceOf(ServiceError);
    expect(action).not.toHaveBeenCalled();
  });

  it('closes again after a successful half-open attempt', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, timeoutMs: 0 });

    await expect(breaker.exec(() => Promise.reject(new Error('down')))).rejects.toThrow('down');
    expect(breaker.getState()).toBe('OPEN');

    await expect(breaker.exec(() => Promise.resolve('ok'))).resolves.toBe('ok');
    expect(breaker.getState()).toBe('CLOSED');
  });
});

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('done');

    await expect(withRetry(fn, { retries: 2, minTimeoutMs: 0 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    await expect(withRetry(fn, { retries: 1, minTimeoutMs: 0 })).rejects.toThrow('last');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('exposes factory errors with the right status', () => {
    expect(notFoundError('missing').statusCode).toBe(404);
  });
});
