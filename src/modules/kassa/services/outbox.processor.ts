import { Injectable, Inject, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import {
  DispatchedEvent,
  EventDispatcher,
  IngestionMetrics,
  OutboxEvent,
  OutboxStatus,
  StorageAdapter,
} from '../../../core';
import { EVENT_DISPATCHER, INGESTION_METRICS, STORAGE_ADAPTER } from '../constants';
import { ConfigurationService } from './configuration.service';

export interface OutboxRunResult {
  delivered: number;
  failed: number;
}

/**
 * Outbox Processor
 *
 * Delivers outbox events written alongside ledger entries to the in-process
 * event dispatcher. Failed deliveries back off and are retried until they
 * reach the dead letter state.
 */
@Injectable()
export class OutboxProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboxProcessor.name);
  private intervalId?: NodeJS.Timeout;
  private isProcessing = false;

  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(EVENT_DISPATCHER)
    private readonly eventDispatcher: EventDispatcher,
    private readonly configuration: ConfigurationService,
    @Inject(INGESTION_METRICS)
    private readonly metrics: IngestionMetrics,
  ) {}

  onModuleInit(): void {
    if (this.configuration.isOutboxEnabled()) {
      this.startProcessing();
    }
  }

  onModuleDestroy(): void {
    this.stopProcessing();
  }

  /**
   * Start processing outbox events
   */
  startProcessing(): void {
    if (this.intervalId) {
      return;
    }
    const intervalMs = this.configuration.getOutboxPollIntervalMs();

    this.logger.log(`Starting outbox processor (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => {
      void this.processOutboxEvents();
    }, intervalMs);

    // Process immediately on start
    void this.processOutboxEvents();
  }

  /**
   * Stop processing outbox events
   */
  stopProcessing(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped outbox processor');
    }
  }

  /**
   * Deliver due pending events, then due retries. Never rejects.
   */
  async processOutboxEvents(): Promise<OutboxRunResult> {
    const result: OutboxRunResult = { delivered: 0, failed: 0 };
    if (this.isProcessing) {
      return result;
    }

    this.isProcessing = true;

    try {
      const now = new Date();
      const limit = this.configuration.getOutboxBatchSize();
      const due = [
        ...(await this.storageAdapter.getOutboxEvents({
          status: OutboxStatus.PENDING,
          scheduledBefore: now,
          limit,
        })),
        ...(await this.storageAdapter.getOutboxEvents({
          status: OutboxStatus.FAILED,
          scheduledBefore: now,
          limit,
        })),
      ];

      if (due.length > 0) {
        this.logger.debug(`Processing ${due.length} outbox events`);
      }

      for (const event of due) {
        if (await this.processOutboxEvent(event)) {
          result.delivered++;
        } else {
          result.failed++;
        }
      }
    } catch (error) {
      this.logger.error(
        'Error processing outbox events',
        error instanceof Error ? error.stack : String(error),
      );
    } finally {
      this.isProcessing = false;
    }

    return result;
  }

  /**
   * Get outbox statistics
   */
  async getStatistics(): Promise<Record<OutboxStatus, number>> {
    const [pending, delivered, failed, deadLetter] = await Promise.all([
      this.countByStatus(OutboxStatus.PENDING),
      this.countByStatus(OutboxStatus.DELIVERED),
      this.countByStatus(OutboxStatus.FAILED),
      this.countByStatus(OutboxStatus.DEAD_LETTER),
    ]);

    return {
      [OutboxStatus.PENDING]: pending,
      [OutboxStatus.DELIVERED]: delivered,
      [OutboxStatus.FAILED]: failed,
      [OutboxStatus.DEAD_LETTER]: deadLetter,
    };
  }

  private async processOutboxEvent(event: OutboxEvent): Promise<boolean> {
    const dispatched: DispatchedEvent = {
      id: event.id,
      tenantId: event.tenantId,
      eventType: event.eventType,
      payload: event.payload,
      createdAt: event.createdAt,
    };

    const { success, errors } = await this.eventDispatcher.dispatchAndWait(
      event.eventType,
      dispatched,
    );

    if (success) {
      await this.storageAdapter.markOutboxEventDelivered(event.id);
      this.metrics.recordDeliveryLag(Date.now() - event.createdAt.getTime());
      this.logger.debug(`Delivered outbox event ${event.id}`);
      return true;
    }

    const errorMessage = errors.map((error) => error.message).join('; ');
    this.logger.error(`Failed to deliver outbox event ${event.id}: ${errorMessage}`);

    const updated = await this.storageAdapter.markOutboxEventFailed(event.id, errorMessage);
    if (updated.status === OutboxStatus.DEAD_LETTER) {
      this.logger.warn(`Outbox event ${event.id} moved to dead letter queue`);
    }
    return false;
  }

  private async countByStatus(status: OutboxStatus): Promise<number> {
    const events = await this.storageAdapter.getOutboxEvents({ status });
    return events.length;
  }
}
