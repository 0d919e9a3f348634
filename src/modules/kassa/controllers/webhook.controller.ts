import {
  Controller,
  Post,
  Param,
  Body,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
  UseInterceptors,
  Inject,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import {
  IngestionError,
  IngestOutcome,
  ProviderNotFoundError,
  WebhookHeaders,
  WebhookIngestionService,
  isIngestionError,
} from '../../../core';
import { ApiWebhookEndpoint, WebhookResponseDto } from '../../../_shared';
import { WEBHOOK_INGESTION_SERVICE } from '../constants';

const OUTCOME_MESSAGES: Record<IngestOutcome['outcome'], string> = {
  processed: 'Event processed',
  ignored: 'Event type is not handled; acknowledged',
  duplicate: 'Event already processed; acknowledged',
};

/**
 * Webhook Controller
 *
 * The one HTTP endpoint providers POST to. The body reaches the pipeline as
 * the exact bytes the provider signed.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_INGESTION_SERVICE)
    private readonly ingestion: WebhookIngestionService,
  ) {}

  @Post(':provider')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Param('provider') provider: string,
    @Body() rawBody: Buffer,
    @Headers() headers: WebhookHeaders,
  ): Promise<WebhookResponseDto> {
    this.logger.log(`Received webhook from provider: ${provider}`);

    try {
      const result = await this.ingestion.ingestWebhook(provider, rawBody, headers);
      return toResponse(result);
    } catch (error) {
      if (!isIngestionError(error)) {
        throw error;
      }
      if (error.category === 'skip' || error.category === 'duplicate') {
        return {
          outcome: error.category === 'skip' ? 'ignored' : 'duplicate',
          provider: provider.trim().toLowerCase(),
          message: error.message,
        };
      }

      const exception = toHttpException(error);
      if (exception.getStatus() >= 500) {
        this.logger.error(`Webhook from ${provider} failed: ${error.message}`, error.stack);
      } else {
        this.logger.warn(`Webhook from ${provider} rejected: ${error.message}`);
      }
      throw exception;
    }
  }
}

export function toResponse(result: IngestOutcome): WebhookResponseDto {
  return {
    outcome: result.outcome,
    kind: result.kind,
    provider: result.provider,
    tenantId: result.tenantId,
    providerEventId: result.providerEventId,
    message: OUTCOME_MESSAGES[result.outcome],
  };
}

/**
 * HTTP status for a pipeline failure. Providers retry on 5xx, so only
 * failures a retry could fix map there.
 */
export function toHttpException(error: IngestionError): HttpException {
  const body = { message: error.message, error: error.name };

  if (error instanceof ProviderNotFoundError) {
    return new NotFoundException(body);
  }
  switch (error.category) {
    case 'signature':
      return new UnauthorizedException(body);
    case 'validation':
      return new UnprocessableEntityException(body);
    case 'skip':
    case 'duplicate':
      return new HttpException(body, HttpStatus.OK);
    case 'configuration':
    case 'ledger':
      return new InternalServerErrorException(body);
  }
}
