import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resetConfigForTesting } from '../config';
import { badRequestError } from '../errors';
import { resetLoggerForTesting } from '../logger';
import { buildServer } from '../server';

describe('buildServer', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    process.env.LOG_LEVEL = 'silent';
    resetConfigForTesting();
    resetLoggerForTesting();

    server = await buildServer();
    server.get('/boom', async () => {
      throw badRequestError('Nothing to see.', { reason: 'test' });
    });
    server.get('/crash', async () => {
      throw new Error('internal detail');
    });
  });

  afterEach(async () => {
    await server.close();
    delete process.env.ENABLE_REQUEST_LOGGING;
    delete process.env.LOG_LEVEL;
    resetConfigForTesting();
    resetLoggerForTesting();
  });

  it('responds to /health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', service: 'skillgap-service' });
  });

  it('responds to /ready', async () => {
    const response = await server.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ready', service: 'skillgap-service' });
  });

  it('echoes the incoming request id', async () => {
    const response = await server.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'req-123' } });

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('generates a request id when none is sent', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('serializes service errors through the error handler', async () => {
    const response = await server.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ code: 'bad_request', message: 'Nothing to see.', details: { reason: 'test' } });
  });

  it('hides unexpected failures', async () => {
    const response = await server.inject({ method: 'GET', url: '/crash' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ code: 'internal', message: 'An unexpected error occurred.' });
  });

  it('can skip the default routes', async () => {
    const bare = await buildServer({ disableDefaultHealthRoute: true, disableDefaultReadyRoute: true });

    const response = await bare.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(404);

    await bare.close();
  });
});
