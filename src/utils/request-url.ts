import type { FastifyRequest } from 'fastify';

/**
 * Scheme and host for absolute links. PUBLIC_BASE_URL wins over what the
 * request (or the proxy in front of it) reports.
 */
export function resolveBaseUrl(request: FastifyRequest): string {
  const configured = request.server.appConfig.publicBaseUrl;
  if (configured) {
    return configured;
  }
  return `${request.protocol}://${request.host}`;
}
