export interface RequestContext {
  requestId: string;
}

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}
