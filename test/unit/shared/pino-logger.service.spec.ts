import { describe, it, expect } from 'vitest';
import {
  PinoLoggerService,
  createPinoLogger,
} from '../../../src/shared/logging/pino-logger.service';
import { createTestConfigService } from '../helpers/mock-factories';

describe('PinoLoggerService', () => {
  const capture = (logLevel = 'debug') => {
    const lines: string[] = [];
    const destination = {
      write: (line: string) => {
        lines.push(line);
      },
    };
    const config = createTestConfigService({ LOG_LEVEL: logLevel });
    const logger = new PinoLoggerService(createPinoLogger(config, destination));
    const entries = (): unknown[] => lines.map((line): unknown => JSON.parse(line));

    return { logger, entries };
  };

  it('should bind the component context and the request scope', () => {
    const { logger, entries } = capture();

    logger
      .withContext('ImageController')
      .forRequest({ requestId: 'req-7', method: 'GET', path: '/t/fit/1/1/ce/0/abc' })
      .info({ status: 200 }, 'Processed image');

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'info',
        service: 'image-gateway',
        env: 'test',
        context: 'ImageController',
        requestId: 'req-7',
        method: 'GET',
        path: '/t/fit/1/1/ce/0/abc',
        status: 200,
        msg: 'Processed image',
      }),
    ]);
  });

  it('should accept the message-first calls Nest makes', () => {
    const { logger, entries } = capture();

    logger.log('Mapped {/health, GET} route', 'RouterExplorer');
    logger.error('Nest could not start', 'Error: boom\n    at main', 'ExceptionHandler');

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'info',
        context: 'RouterExplorer',
        msg: 'Mapped {/health, GET} route',
      }),
      expect.objectContaining({
        level: 'error',
        context: 'ExceptionHandler',
        stack: 'Error: boom\n    at main',
        msg: 'Nest could not start',
      }),
    ]);
  });

  it('should leave out the context when none is set', () => {
    const { logger, entries } = capture();

    logger.info('Image gateway started');

    const [entry] = entries();
    expect(entry).toMatchObject({ level: 'info', msg: 'Image gateway started' });
    expect(entry).not.toHaveProperty('context');
  });

  it('should drop lines below the configured level', () => {
    const { logger, entries } = capture('warn');

    logger.debug({ stage: 'Fetching' }, 'Stage entered');
    logger.info('Request received');
    logger.warn({ status: 404 }, 'Request rejected');

    expect(entries()).toEqual([
      expect.objectContaining({ level: 'warn', status: 404, msg: 'Request rejected' }),
    ]);
  });
});
