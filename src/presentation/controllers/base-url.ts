import type { FastifyRequest } from 'fastify';

/** Scheme and authority the client used, e.g. "http://localhost:8080". */
export function baseUrl(request: FastifyRequest): string {
  return `${request.protocol}://${request.headers.host ?? 'localhost'}`;
}
