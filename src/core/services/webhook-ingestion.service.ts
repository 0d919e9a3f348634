import { Logger } from '@nestjs/common';
import {
  EventAlreadyProcessedError,
  EventIgnoredError,
  InvalidPayloadError,
  InvalidSignatureError,
  ProviderNotFoundError,
} from '../errors';
import {
  PaymentProviderAdapter,
  StorageAdapter,
  supportsDisputes,
  WebhookHeaders,
} from '../interfaces';
import { AdapterRegistry, normalizeProvider } from '../registry';
import { CredentialVault } from '../vault';
import { DisputeEventProcessor } from './dispute-event.processor';
import { PaymentEventProcessor } from './payment-event.processor';

export type IngestOutcomeStatus = 'processed' | 'ignored' | 'duplicate';

export type IngestedKind = 'payment' | 'dispute';

export interface IngestOutcome {
  outcome: IngestOutcomeStatus;
  kind?: IngestedKind;
  tenantId?: string;
  provider: string;
  providerEventId?: string;
}

/**
 * Webhook ingestion orchestrator
 *
 * The tenant is unknown until a signature verifies: every active
 * configuration for the provider is tried in creation order and the first
 * one whose credentials verify the body owns the event.
 */
export class WebhookIngestionService {
  private readonly logger = new Logger(WebhookIngestionService.name);

  constructor(
    private readonly storage: StorageAdapter,
    private readonly registry: AdapterRegistry,
    private readonly vault: CredentialVault,
    private readonly payments: PaymentEventProcessor,
    private readonly disputes: DisputeEventProcessor,
  ) {}

  async ingestWebhook(
    provider: string,
    rawBody: Buffer,
    headers: WebhookHeaders,
  ): Promise<IngestOutcome> {
    const name = normalizeProvider(provider);
    if (!this.registry.providerExists(name)) {
      throw new ProviderNotFoundError(provider);
    }
    if (!isStructuredBody(rawBody)) {
      throw new InvalidPayloadError(
        'webhook body must be a JSON object or a form-encoded body',
      );
    }

    const configs = await this.storage.listActiveProviderConfigs(name);
    if (configs.length === 0) {
      throw new ProviderNotFoundError(name);
    }

    for (const config of configs) {
      const values = this.vault.decrypt(config.encryptedConfig);
      const adapter = this.registry.newAdapter(name, {
        tenantId: config.tenantId,
        values,
      });

      try {
        await adapter.verify(rawBody, headers);
      } catch (error) {
        if (error instanceof InvalidSignatureError) {
          continue;
        }
        throw error;
      }

      this.logger.debug(`Webhook for ${name} verified by tenant ${config.tenantId}`);
      return this.route(adapter, name, config.tenantId, rawBody);
    }

    this.logger.warn(
      `No active ${name} configuration verified the webhook (${configs.length} tried)`,
    );
    throw new InvalidSignatureError('no active configuration verified the webhook');
  }

  private async route(
    adapter: PaymentProviderAdapter,
    provider: string,
    tenantId: string,
    rawBody: Buffer,
  ): Promise<IngestOutcome> {
    try {
      if (supportsDisputes(adapter)) {
        const dispute = await this.tryParseDispute(() => adapter.parseDispute(rawBody));
        if (dispute) {
          const event = { ...dispute, provider, tenantId };
          return await this.settle('dispute', provider, tenantId, event.providerEventId, () =>
            this.disputes.process(event),
          );
        }
      }

      const payment = await adapter.parse(rawBody);
      const event = { ...payment, provider, tenantId };
      return await this.settle('payment', provider, tenantId, event.providerEventId, () =>
        this.payments.process(event),
      );
    } catch (error) {
      if (error instanceof EventIgnoredError) {
        this.logger.debug(`Ignored ${provider} event ${error.eventType}`.trimEnd());
        return { outcome: 'ignored', tenantId, provider };
      }
      throw error;
    }
  }

  private async tryParseDispute<T>(parse: () => Promise<T>): Promise<T | null> {
    try {
      return await parse();
    } catch (error) {
      if (error instanceof EventIgnoredError) {
        return null;
      }
      throw error;
    }
  }

  private async settle(
    kind: IngestedKind,
    provider: string,
    tenantId: string,
    providerEventId: string,
    work: () => Promise<unknown>,
  ): Promise<IngestOutcome> {
    try {
      await work();
      return { outcome: 'processed', kind, tenantId, provider, providerEventId };
    } catch (error) {
      if (error instanceof EventAlreadyProcessedError) {
        this.logger.log(`Duplicate ${kind} event ${provider}/${providerEventId}`);
        return { outcome: 'duplicate', kind, tenantId, provider, providerEventId };
      }
      throw error;
    }
  }
}

/**
 * A JSON object, or a form-encoded body with at least one named field
 */
export function isStructuredBody(rawBody: Buffer): boolean {
  const text = rawBody.toString('utf8').trim();
  if (!text) {
    return false;
  }

  const parsed = parseJson(text);
  if (parsed !== undefined) {
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  }

  return text.split('&').some((pair) => pair.indexOf('=') > 0);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
