import { FastifyAdapter } from '@nestjs/platform-fastify';
import { IncomingMessage } from 'http';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

export function newRequestId(): string {
  return uuidv4();
}

/**
 * Keep an upstream `x-request-id` only when it is a single well-formed uuid;
 * anything else gets a fresh id.
 */
export function resolveRequestId(incoming: string | string[] | undefined): string {
  return typeof incoming === 'string' && isUuid(incoming) ? incoming.toLowerCase() : newRequestId();
}

export function createFastifyAdapter(): FastifyAdapter {
  return new FastifyAdapter({
    genReqId: (req: IncomingMessage) => resolveRequestId(req.headers[REQUEST_ID_HEADER]),
    requestIdHeader: false,
    disableRequestLogging: true,
  });
}
