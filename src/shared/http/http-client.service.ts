import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Agent, Dispatcher, request } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export const HTTP_DISPATCHER = 'HttpDispatcher';

/**
 * Shared connection pool for source downloads: per-origin keep-alive,
 * idle sockets evicted after 30s.
 */
export function createHttpAgent(): Agent {
  return new Agent({
    connections: 10,
    pipelining: 1,
    keepAliveTimeout: 30000,
    keepAliveMaxTimeout: 60000,
  });
}

export interface HttpDownloadOptions {
  headers?: Record<string, string>;
  timeout?: number;
  /** Abort once the body grows past this many bytes */
  maxBytes?: number;
}

export interface HttpBufferResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Buffer;
}

export class ResponseTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`Response body exceeds ${limitBytes} bytes`);
    this.name = 'ResponseTooLargeError';
  }
}

/**
 * HTTP client for untrusted origins.
 *
 * Every request goes through the injected dispatcher and is a single
 * attempt: callers decide what a failure means. The dispatcher is closed
 * with the module.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly defaultTimeout = 30000;
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(PinoLoggerService) logger: PinoLoggerService,
    @Inject(HTTP_DISPATCHER) private readonly agent: Dispatcher,
  ) {
    this.logger = logger.withContext(HttpClientService.name);
  }

  async downloadToBuffer(
    url: string,
    options: HttpDownloadOptions = {},
  ): Promise<HttpBufferResponse> {
    const timeout = options.timeout ?? this.defaultTimeout;

    const response = await request(url, {
      method: 'GET',
      dispatcher: this.agent,
      headers: options.headers,
      headersTimeout: timeout,
      bodyTimeout: timeout,
      maxRedirections: 3,
    });

    const headers = response.headers;
    const limit = options.maxBytes;

    const declaredLength = Number(headers['content-length']);
    if (limit !== undefined && Number.isFinite(declaredLength) && declaredLength > limit) {
      response.body.destroy();
      throw new ResponseTooLargeError(limit);
    }

    const chunks: Buffer[] = [];
    let received = 0;

    for await (const chunk of response.body) {
      const buffer = Buffer.from(chunk);
      received += buffer.length;

      if (limit !== undefined && received > limit) {
        response.body.destroy();
        throw new ResponseTooLargeError(limit);
      }
      chunks.push(buffer);
    }

    this.logger.debug(
      { url, statusCode: response.statusCode, bytes: received },
      'HTTP download finished',
    );

    return {
      statusCode: response.statusCode,
      headers,
      body: Buffer.concat(chunks),
    };
  }

  async onModuleDestroy(): Promise<void> {
    await this.agent.close();
  }
}
