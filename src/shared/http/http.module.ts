import { Module } from '@nestjs/common';
import { LoggingModule } from '../logging/logging.module';
import { HTTP_DISPATCHER, HttpClientService, createHttpAgent } from './http-client.service';

@Module({
  imports: [LoggingModule],
  providers: [
    {
      provide: HTTP_DISPATCHER,
      useFactory: createHttpAgent,
    },
    HttpClientService,
  ],
  exports: [HttpClientService],
})
export class HttpModule {}
