import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  AdapterRegistry,
  CredentialVault,
  DisputeEventProcessor,
  EventDispatcher,
  EventDispatcherImpl,
  IngestionMetrics,
  LedgerService,
  LoggingEventHandler,
  PaymentEventProcessor,
  ProviderConfigService,
  StorageAdapter,
  WebhookIngestionService,
} from '../../core';
import { createProviderRegistry } from '../../adapters/providers';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import {
  KassaModuleConfig,
  KassaModuleAsyncConfig,
  resolveKassaConfig,
} from './kassa.config';
import {
  ADAPTER_REGISTRY,
  CREDENTIAL_VAULT,
  DISPUTE_EVENT_PROCESSOR,
  EVENT_DISPATCHER,
  INGESTION_METRICS,
  KASSA_CONFIG,
  LEDGER_SERVICE,
  PAYMENT_EVENT_PROCESSOR,
  PROVIDER_CONFIG_SERVICE,
  STORAGE_ADAPTER,
  WEBHOOK_INGESTION_SERVICE,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { OutboxProcessor } from './services/outbox.processor';

const EXPORTED_TOKENS = [
  KASSA_CONFIG,
  STORAGE_ADAPTER,
  EVENT_DISPATCHER,
  INGESTION_METRICS,
  LEDGER_SERVICE,
  WEBHOOK_INGESTION_SERVICE,
  PROVIDER_CONFIG_SERVICE,
  ConfigurationService,
  OutboxProcessor,
];

/**
 * Kassa Module - Main NestJS Module
 *
 * Wires storage, the provider registry, the credential vault and the
 * ingestion pipeline from one KassaModuleConfig.
 */
@Global()
@Module({})
export class KassaModule {
  /**
   * Configure Kassa synchronously
   */
  static forRoot(config: KassaModuleConfig): DynamicModule {
    return {
      module: KassaModule,
      providers: [
        {
          provide: KASSA_CONFIG,
          useValue: resolveKassaConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure Kassa asynchronously, e.g. from ConfigService
   */
  static forRootAsync(options: KassaModuleAsyncConfig): DynamicModule {
    return {
      module: KassaModule,
      imports: options.imports || [],
      providers: [
        {
          provide: KASSA_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveKassaConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers shared by both entry points; everything reads KASSA_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: createStorageAdapter,
        inject: [KASSA_CONFIG],
      },
      {
        provide: CREDENTIAL_VAULT,
        useFactory: (config: KassaModuleConfig) =>
          new CredentialVault(config.encryptionSecret),
        inject: [KASSA_CONFIG],
      },
      {
        provide: ADAPTER_REGISTRY,
        useFactory: (config: KassaModuleConfig) =>
          createProviderRegistry(config.providers),
        inject: [KASSA_CONFIG],
      },
      {
        provide: INGESTION_METRICS,
        useFactory: (config: KassaModuleConfig) =>
          new IngestionMetrics(config.metrics?.collector),
        inject: [KASSA_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: createEventDispatcher,
        inject: [KASSA_CONFIG],
      },
      {
        provide: LEDGER_SERVICE,
        useFactory: (
          config: KassaModuleConfig,
          storage: StorageAdapter,
          metrics: IngestionMetrics,
        ) =>
          new LedgerService(storage, metrics, {
            outboxMaxRetries: config.outbox?.maxRetries,
          }),
        inject: [KASSA_CONFIG, STORAGE_ADAPTER, INGESTION_METRICS],
      },
      {
        provide: PAYMENT_EVENT_PROCESSOR,
        useFactory: (
          storage: StorageAdapter,
          ledger: LedgerService,
          metrics: IngestionMetrics,
        ) => new PaymentEventProcessor(storage, ledger, metrics),
        inject: [STORAGE_ADAPTER, LEDGER_SERVICE, INGESTION_METRICS],
      },
      {
        provide: DISPUTE_EVENT_PROCESSOR,
        useFactory: (
          storage: StorageAdapter,
          ledger: LedgerService,
          metrics: IngestionMetrics,
        ) => new DisputeEventProcessor(storage, ledger, metrics),
        inject: [STORAGE_ADAPTER, LEDGER_SERVICE, INGESTION_METRICS],
      },
      {
        provide: WEBHOOK_INGESTION_SERVICE,
        useFactory: (
          storage: StorageAdapter,
          registry: AdapterRegistry,
          vault: CredentialVault,
          payments: PaymentEventProcessor,
          disputes: DisputeEventProcessor,
        ) =>
          new WebhookIngestionService(storage, registry, vault, payments, disputes),
        inject: [
          STORAGE_ADAPTER,
          ADAPTER_REGISTRY,
          CREDENTIAL_VAULT,
          PAYMENT_EVENT_PROCESSOR,
          DISPUTE_EVENT_PROCESSOR,
        ],
      },
      {
        provide: PROVIDER_CONFIG_SERVICE,
        useFactory: (
          storage: StorageAdapter,
          registry: AdapterRegistry,
          vault: CredentialVault,
        ) => new ProviderConfigService(storage, registry, vault),
        inject: [STORAGE_ADAPTER, ADAPTER_REGISTRY, CREDENTIAL_VAULT],
      },
      ConfigurationService,
      OutboxProcessor,
    ];
  }
}

async function createStorageAdapter(
  config: KassaModuleConfig,
): Promise<StorageAdapter> {
  switch (config.storage.type) {
    case 'mock':
      return new MockStorageAdapter();

    case 'typeorm': {
      const dataSource = createDataSource(config.storage.options);
      await dataSource.initialize();
      return new TypeORMStorageAdapter(dataSource);
    }

    case 'custom':
      if (!config.storage.adapter) {
        throw new Error('Custom storage adapter not provided');
      }
      return config.storage.adapter;
  }
}

function createEventDispatcher(config: KassaModuleConfig): EventDispatcher {
  const dispatcher = config.events?.dispatcher ?? new EventDispatcherImpl();

  if (config.events?.enableLogging) {
    const loggingHandler = new LoggingEventHandler(
      new Logger('KassaEvents'),
      config.events.logLevel,
    );
    dispatcher.onAll(loggingHandler.getHandler());
  }

  for (const { eventType, handler } of config.events?.handlers ?? []) {
    dispatcher.on(eventType, handler);
  }

  return dispatcher;
}
