import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ApplicationModule } from '../application/application.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { ImageProxyExceptionFilter } from './filters/image-proxy-exception.filter';
import { ImageController } from './image.controller';
import { ImageResponseEncoder } from './image-response.encoder';

/**
 * Gateway Module
 * HTTP driving adapter: the catch-all image route, the response encoder and
 * the global exception filter
 */
@Module({
  imports: [ApplicationModule, LoggingModule],
  controllers: [ImageController],
  providers: [
    ImageResponseEncoder,
    {
      provide: APP_FILTER,
      useClass: ImageProxyExceptionFilter,
    },
  ],
})
export class GatewayModule {}
