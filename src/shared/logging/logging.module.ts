import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { PINO_LOGGER, PinoLoggerService, createPinoLogger } from './pino-logger.service';

/**
 * One pino instance for the process. `main.ts` installs it as the Nest logger;
 * services derive context loggers from it with `withContext`.
 */
@Global()
@Module({
  providers: [
    {
      provide: PINO_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        createPinoLogger(configService),
    },
    PinoLoggerService,
  ],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
