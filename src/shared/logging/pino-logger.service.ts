import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Level, Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

export const PINO_LOGGER = 'PinoLogger';

type LogFields = Record<string, unknown>;

/**
 * Root pino instance. Development output goes through pino-pretty; a
 * destination stream, when given, replaces stdout.
 */
export function createPinoLogger(
  configService: ConfigService<AppConfig, true>,
  destination?: DestinationStream,
): Logger {
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const options: pino.LoggerOptions = {
    level: configService.get('logLevel', { infer: true }),
    ...(nodeEnv === 'development' &&
      destination === undefined && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'image-gateway',
      env: nodeEnv,
    },
  };

  return destination === undefined ? pino(options) : pino(options, destination);
}

/**
 * Nest logger backed by pino.
 *
 * Structured calls take `(fields, message)`; Nest's own calls take
 * `(message, context?)`. Derived loggers share the root pino instance and
 * add bindings: a component `context`, or the request scope
 * (`requestId`, `method`, `path`).
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private context?: string;

  constructor(@Inject(PINO_LOGGER) private logger: Logger) {}

  log(message: string, context?: string): void {
    this.write('info', {}, message, context);
  }

  info(message: string): void;
  info(fields: LogFields, message: string): void;
  info(fieldsOrMessage: LogFields | string, message?: string): void {
    this.dispatch('info', fieldsOrMessage, message);
  }

  warn(fieldsOrMessage: LogFields | string, messageOrContext?: string): void {
    this.dispatch('warn', fieldsOrMessage, messageOrContext);
  }

  debug(fieldsOrMessage: LogFields | string, messageOrContext?: string): void {
    this.dispatch('debug', fieldsOrMessage, messageOrContext);
  }

  error(fieldsOrMessage: LogFields | string, stackOrMessage?: string, context?: string): void {
    if (typeof fieldsOrMessage === 'string') {
      const fields = stackOrMessage === undefined ? {} : { stack: stackOrMessage };
      this.write('error', fields, fieldsOrMessage, context);
    } else {
      this.write('error', fieldsOrMessage, stackOrMessage ?? '');
    }
  }

  verbose(message: string, context?: string): void {
    this.write('trace', {}, message, context);
  }

  withContext(context: string): PinoLoggerService {
    const derived = this.derive({});
    derived.context = context;
    return derived;
  }

  /**
   * Bindings for every line logged while handling one image request
   */
  forRequest(request: { requestId: string; method: string; path: string }): PinoLoggerService {
    return this.derive(request);
  }

  /**
   * Structured form when the first argument is an object; otherwise Nest's
   * form, where the second argument is the context.
   */
  private dispatch(level: Level, fieldsOrMessage: LogFields | string, second?: string): void {
    if (typeof fieldsOrMessage === 'string') {
      this.write(level, {}, fieldsOrMessage, second);
    } else {
      this.write(level, fieldsOrMessage, second ?? '');
    }
  }

  private write(level: Level, fields: LogFields, message: string, context?: string): void {
    const resolvedContext = context ?? this.context;
    this.logger[level](
      resolvedContext === undefined ? fields : { ...fields, context: resolvedContext },
      message,
    );
  }

  private derive(bindings: LogFields): PinoLoggerService {
    const derived: PinoLoggerService = Object.create(this);
    derived.logger = this.logger.child(bindings);
    return derived;
  }
}
