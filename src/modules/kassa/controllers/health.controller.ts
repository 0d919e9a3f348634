import { Controller, Get, Inject, HttpStatus, HttpCode} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type {
  IngestionMetrics,
  IngestionMetricsSnapshot,
  OutboxStatus,
  StorageAdapter,
} from '../../../core';
import { INGESTION_METRICS, STORAGE_ADAPTER } from '../constants';
import { OutboxProcessor } from '../services/outbox.processor';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';

export interface ReadinessReport {
  status: 'ready' | 'not_ready';
  checks: {
    storage: boolean;
  };
}

export interface PipelineStatistics {
  ingestion: IngestionMetricsSnapshot;
  outbox: Record<OutboxStatus, number>;
  runtime: {
    uptime: number;
    node: string;
  };
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(INGESTION_METRICS)
    private readonly metrics: IngestionMetrics,
    private readonly outboxProcessor: OutboxProcessor,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): { status: string; timestamp: Date; uptime: number } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessReport> {
    const storage = await this.storageAdapter.isHealthy();

    return {
      status: storage ? 'ready' : 'not_ready',
      checks: { storage },
    };
  }

  @Get('metrics')
  @ApiServiceStatistics()
  async statistics(): Promise<PipelineStatistics> {
    return {
      ingestion: this.metrics.getMetrics(),
      outbox: await this.outboxProcessor.getStatistics(),
      runtime: {
        uptime: process.uptime(),
        node: process.version,
      },
    };
  }
}
