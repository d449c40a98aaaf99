import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';
import {
  ProcessImageCommand,
  ProcessImagePort,
  ProcessImageResult,
} from '../ports/input/process-image.port';
import { ADMISSION_PORT, AdmissionPort } from '../ports/output/admission.port';
import { CLOCK_PORT, ClockPort } from '../ports/output/clock.port';
import { FINGERPRINT_PORT, FingerprintPort } from '../ports/output/fingerprint.port';
import {
  IMAGE_TRANSFORMER_PORT,
  ImageTransformerPort,
} from '../ports/output/image-transformer.port';
import {
  SIGNATURE_VERIFIER_PORT,
  SignatureVerifierPort,
} from '../ports/output/signature-verifier.port';
import {
  FetchedSource,
  SOURCE_FETCHER_PORT,
  SourceFetcherPort,
} from '../ports/output/source-fetcher.port';
import { AppConfig } from '../../config/configuration';
import { decodeProcessingPath } from '../../domain/codecs/processing-path.codec';
import {
  INVALID_SECRET_ERROR,
  ImageProxyError,
  NOT_MODIFIED_ERROR,
  describeError,
} from '../../domain/errors/image-proxy.error';
import { PipelineStage, canTransition } from '../../domain/value-objects/pipeline-stage.vo';
import { RequestBudget } from '../../domain/value-objects/request-budget.vo';

const BEARER_PREFIX = 'Bearer ';

/**
 * Process Image Use Case
 *
 * Orchestrates one image request:
 * Authenticating → (admission) → PathDecoding → URLValidating → Fetching
 * → CacheChecking → Transforming → Responding.
 *
 * Every failure is raised as an ImageProxyError and rendered by the global
 * exception filter; a cache hit is raised as NOT_MODIFIED_ERROR. The budget
 * is checked before each stage after admission, and the admission slot is
 * held until `command.respond` has finished writing the image.
 */
@Injectable()
export class ProcessImageUseCase implements ProcessImagePort {
  private readonly logger = new Logger(ProcessImageUseCase.name);

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
    @Inject(ADMISSION_PORT) private readonly admission: AdmissionPort,
    @Inject(SOURCE_FETCHER_PORT) private readonly sourceFetcher: SourceFetcherPort,
    @Inject(IMAGE_TRANSFORMER_PORT) private readonly transformer: ImageTransformerPort,
    @Inject(FINGERPRINT_PORT) private readonly fingerprint: FingerprintPort,
    @Inject(SIGNATURE_VERIFIER_PORT) private readonly signatureVerifier: SignatureVerifierPort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
  ) {}

  async execute(command: ProcessImageCommand): Promise<ProcessImageResult> {
    const { writeTimeoutMs } = this.configService.get('server', { infer: true });
    const budget = RequestBudget.start(command.requestId, writeTimeoutMs, () => this.clock.now());

    this.authenticate(command.authorization);

    return this.admission.run(() => this.runPipeline(command, budget));
  }

  /**
   * Constant-time check of `Authorization: Bearer <secret>`. Both sides are
   * hashed first so the comparison length never depends on the input.
   */
  private authenticate(authorization: string | undefined): void {
    const { secret } = this.configService.get('security', { infer: true });
    if (secret.length === 0) {
      return;
    }

    if (authorization === undefined || !authorization.startsWith(BEARER_PREFIX)) {
      throw INVALID_SECRET_ERROR;
    }

    const presented = createHash('sha256').update(authorization.slice(BEARER_PREFIX.length)).digest();
    const expected = createHash('sha256').update(secret).digest();

    if (!timingSafeEqual(presented, expected)) {
      throw INVALID_SECRET_ERROR;
    }
  }

  private async runPipeline(
    command: ProcessImageCommand,
    budget: RequestBudget,
  ): Promise<ProcessImageResult> {
    const processing = this.configService.get('processing', { infer: true });

    let stage = this.advance(budget, PipelineStage.AUTHENTICATING, PipelineStage.PATH_DECODING);
    const decoded = decodeProcessingPath(command.path, this.transformer.savableFormats);
    try {
      this.signatureVerifier.verify(decoded.token, decoded.signedPath);
    } catch (error) {
      throw ImageProxyError.invalidUrl(describeError(error), error);
    }

    stage = this.advance(budget, stage, PipelineStage.URL_VALIDATING);
    const sourceUrl = this.resolveSourceUrl(processing.baseUrl, decoded.sourceUrl);

    stage = this.advance(budget, stage, PipelineStage.FETCHING);
    let source: FetchedSource;
    try {
      source = await this.sourceFetcher.fetch(sourceUrl);
    } catch (error) {
      throw ImageProxyError.unreachable(describeError(error), error);
    }

    stage = this.advance(budget, stage, PipelineStage.CACHE_CHECKING);
    let etag: string | undefined;
    if (processing.etagEnabled) {
      etag = this.fingerprint.compute(source.data, decoded.options);

      if (etag === command.ifNoneMatch) {
        command.setHeader('ETag', etag);
        throw NOT_MODIFIED_ERROR;
      }
    }

    stage = this.advance(budget, stage, PipelineStage.TRANSFORMING);
    let data: Buffer;
    try {
      data = await this.transformer.transform(source.data, source.format, decoded.options);
    } catch (error) {
      throw ImageProxyError.processingFailed(describeError(error), error);
    }

    this.advance(budget, stage, PipelineStage.RESPONDING);
    const result: ProcessImageResult = {
      requestId: command.requestId,
      data,
      format: decoded.options.format,
      etag,
      sourceUrl,
      options: decoded.options,
      durationMs: budget.elapsedMs(),
    };

    await command.respond(result);
    return result;
  }

  private advance(budget: RequestBudget, from: PipelineStage, to: PipelineStage): PipelineStage {
    if (!canTransition(from, to)) {
      throw ImageProxyError.unexpected(new Error(`Illegal stage transition ${from} -> ${to}`));
    }

    budget.checkpoint(to);
    this.logger.debug(`[${budget.requestId}] ${to} (${budget.elapsedMs()}ms elapsed)`);
    return to;
  }

  private resolveSourceUrl(baseUrl: string, decodedUrl: string): string {
    const candidate = `${baseUrl}${decodedUrl}`;

    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch (error) {
      throw ImageProxyError.invalidUrl(`Invalid source URL: ${candidate}`, error);
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw ImageProxyError.invalidUrl(`Unsupported source URL scheme: ${parsed.protocol}`);
    }

    return candidate;
  }
}
