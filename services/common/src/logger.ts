import { randomUUID } from 'crypto';

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import pino, { type Logger } from 'pino';

import { getConfig } from './config';
import type { RequestContext } from './types';

type ChildLoggerBindings = Record<string, unknown>;

const requestStarts = new WeakMap<object, bigint>();

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const config = getConfig();
  if (!rootLogger) {
    rootLogger = pino({
      level: config.runtime.logLevel,
      base: {
        service: config.runtime.serviceName
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    });
  }

  return rootLogger;
}

export function getLogger(bindings?: ChildLoggerBindings): Logger {
  const logger = buildRootLogger();
  return bindings ? logger.child(bindings) : logger;
}

export function resetLoggerForTesting(): void {
  rootLogger = null;
}

function headerValueToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }

  return undefined;
}

export const requestLoggingPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const config = getConfig();
  const enableLogging = config.runtime.enableRequestLogging;
  const requestIdHeaderName = config.monitoring.requestIdHeader.toLowerCase();

  fastify.addHook('onRequest', async (request, reply) => {
    const incomingRequestId = headerValueToString(request.headers[requestIdHeaderName]);
    const requestId = incomingRequestId && incomingRequestId.length > 0 ? incomingRequestId : randomUUID();

    const requestContext: RequestContext = { requestId };
    request.requestContext = requestContext;
    requestStarts.set(request, process.hrtime.bigint());

    const childLogger = request.log.child({ request_id: requestId });
    Object.assign(request, { log: childLogger });

    if (enableLogging) {
      request.log.info({ path: request.url, method: request.method }, 'request:start');
    }

    reply.header(config.monitoring.requestIdHeader, requestId);
  });

  fastify.addHook('onResponse', async (request, reply) => {
    if (!enableLogging) {
      return;
    }

    const start = requestStarts.get(request);
    const durationMs = start ? Number(process.hrtime.bigint() - start) / 1_000_000 : undefined;

    request.log.info(
      {
        status_code: reply.statusCode,
        duration_ms: durationMs
      },
      'request:complete'
    );
  });
});
