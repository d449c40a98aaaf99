import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { createFastifyAdapter } from './shared/logging/request-id';

/**
 * Bootstrap the image gateway HTTP server
 */
async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    createFastifyAdapter(),
    { bufferLogs: true },
  );

  // Get services
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const rootLogger = app.get(PinoLoggerService);

  // Use custom logger
  app.useLogger(rootLogger);
  const logger = rootLogger.withContext('Bootstrap');

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const port = configService.get('port', { infer: true });
  const server = configService.get('server', { infer: true });
  const processing = configService.get('processing', { infer: true });

  // Graceful shutdown: app.close() runs onModuleDestroy hooks (admission, HTTP agent)
  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, draining requests...');
    await app.close();
    logger.info('Image gateway shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
  process.on('SIGINT', () => void shutdownHandler('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(port, '0.0.0.0');

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      port,
      concurrency: server.concurrency,
      writeTimeoutMs: server.writeTimeoutMs,
      etagEnabled: processing.etagEnabled,
    },
    'Image gateway started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start image gateway:', error);
  process.exit(1);
});
