import { ArgumentsHost, Catch, ExceptionFilter, Inject } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import {
  ERROR_STATUS,
  ImageProxyError,
  describeError,
  toImageProxyError,
} from '../../domain/errors/image-proxy.error';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { REQUEST_ID_HEADER } from '../../shared/logging/request-id';

/**
 * The single recovery point of a request.
 *
 * Converts whatever escaped the handler into an ImageProxyError, logs the
 * internal message and writes only the public message to the client. A
 * failure while rendering is logged and never rethrown.
 */
@Catch()
export class ImageProxyExceptionFilter implements ExceptionFilter {
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.withContext(ImageProxyExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const reply = http.getResponse<FastifyReply>();
    const error = toImageProxyError(exception);

    this.logError(request.id, error);

    if (reply.sent) {
      this.logger.warn(
        { requestId: request.id, status: error.statusCode },
        'Response already sent, error not rendered',
      );
      return;
    }

    try {
      reply.code(error.statusCode).header(REQUEST_ID_HEADER, request.id);

      if (error.statusCode === ERROR_STATUS.NOT_MODIFIED) {
        reply.send();
        return;
      }

      reply.header('Content-Type', 'text/plain; charset=utf-8').send(error.publicMessage);
    } catch (renderError) {
      this.logger.error(
        { requestId: request.id, error: describeError(renderError) },
        'Failed to render error response',
      );
    }
  }

  private logError(requestId: string, error: ImageProxyError): void {
    const entry = { requestId, status: error.statusCode, error: error.internalMessage };

    if (error.statusCode >= 500) {
      this.logger.error({ ...entry, stack: describeStack(error) }, 'Request failed');
    } else if (error.statusCode >= 400) {
      this.logger.warn(entry, 'Request rejected');
    } else {
      this.logger.info(entry, 'Request short-circuited');
    }
  }
}

function describeStack(error: ImageProxyError): string | undefined {
  return error.cause instanceof Error ? error.cause.stack : error.stack;
}
