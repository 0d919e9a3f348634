import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  LoggingLevel,
  MetricsCollector,
  StorageAdapter,
} from '../../core';
import { ProviderRegistryOptions } from '../../adapters/providers';
import { DatabaseSettings } from '../../adapters/storage/typeorm';

/**
 * Kassa Module Configuration
 */
export interface KassaModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<DatabaseSettings>;
    adapter?: StorageAdapter;
  };

  /**
   * Operator secret from which the credential encryption key is derived.
   * Without it stored provider configs cannot be read or written.
   */
  encryptionSecret?: string;

  /**
   * Adapter tuning shared by every tenant
   */
  providers?: ProviderRegistryOptions;

  /**
   * Event configuration
   */
  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: LoggingLevel;
    handlers?: Array<{
      eventType: string;
      handler: EventHandler;
    }>;
  };

  /**
   * External metrics sink; counters are always kept in memory
   */
  metrics?: {
    collector?: MetricsCollector;
  };

  /**
   * API configuration
   */
  api?: {
    enableSwagger?: boolean;
  };

  /**
   * Outbox configuration
   */
  outbox?: {
    enabled?: boolean;
    pollIntervalMs?: number;
    batchSize?: number;
    maxRetries?: number;
  };

  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface KassaModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    KassaModuleConfig | Promise<KassaModuleConfig>
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultKassaConfig = {
  events: {
    enableLogging: true,
    logLevel: 'normal',
  },
  api: {
    enableSwagger: true,
  },
  outbox: {
    enabled: false,
    pollIntervalMs: 5000,
    batchSize: 100,
    maxRetries: 3,
  },
  debug: false,
} satisfies Partial<KassaModuleConfig>;

/**
 * Merge a caller's config over the defaults, section by section
 */
export function resolveKassaConfig(config: KassaModuleConfig): KassaModuleConfig {
  return {
    ...defaultKassaConfig,
    ...config,
    events: { ...defaultKassaConfig.events, ...config.events },
    api: { ...defaultKassaConfig.api, ...config.api },
    outbox: { ...defaultKassaConfig.outbox, ...config.outbox },
  };
}
