import { Injectable, Inject } from '@nestjs/common';
import type { KassaModuleConfig } from '../kassa.config';
import { KASSA_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to Kassa configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(KASSA_CONFIG)
    private readonly config: KassaModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): KassaModuleConfig {
    return this.config;
  }

  getStorageType(): KassaModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  /**
   * Check if outbox is enabled
   */
  isOutboxEnabled(): boolean {
    return this.config.outbox?.enabled === true;
  }

  getOutboxPollIntervalMs(): number {
    return this.config.outbox?.pollIntervalMs || 5000;
  }

  getOutboxBatchSize(): number {
    return this.config.outbox?.batchSize || 100;
  }

  getOutboxMaxRetries(): number {
    return this.config.outbox?.maxRetries ?? 3;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }

  /**
   * Check if Swagger is enabled
   */
  isSwaggerEnabled(): boolean {
    return this.config.api?.enableSwagger !== false;
  }
}
