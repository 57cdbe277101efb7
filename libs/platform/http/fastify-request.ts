import 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    /** Correlation id echoed as `X-Request-Id` and used as the problem-details `traceId`. */
    requestId?: string;
  }
}

export {};
