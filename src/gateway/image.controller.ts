import { Controller, Get, Inject, Req, Res } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ProcessImageUseCase } from '../application/use-cases/process-image.use-case';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { ImageResponseEncoder } from './image-response.encoder';

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Image Controller
 *
 * Catch-all route for `/{token}/{resize}/{width}/{height}/{gravity}/{enlarge}/{source}`.
 * Errors propagate to the global ImageProxyExceptionFilter.
 */
@Controller()
export class ImageController {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ProcessImageUseCase) private readonly processImage: ProcessImageUseCase,
    @Inject(ImageResponseEncoder) private readonly encoder: ImageResponseEncoder,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.logger = logger.withContext(ImageController.name);
  }

  @Get('*')
  async process(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    const path = request.url.split('?')[0];

    this.logger
      .forRequest({ requestId: request.id, method: request.method, path })
      .info('Request received');

    const acceptEncoding = singleHeader(request.headers['accept-encoding']);

    await this.processImage.execute({
      requestId: request.id,
      path,
      authorization: request.headers.authorization,
      ifNoneMatch: singleHeader(request.headers['if-none-match']),
      setHeader: (name, value) => {
        reply.header(name, value);
      },
      respond: (result) => this.encoder.send(reply, result, acceptEncoding),
    });
  }
}
