import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  LedgerEntryCreatedPayload,
  OutboxEventType,
  OutboxStatus,
} from '../../../../core';

/**
 * TypeORM entity for OutboxEvent
 */
@Entity('outbox_events')
@Index(['status', 'scheduledFor'])
@Index(['dedupeKey'], { unique: true })
@Index(['tenantId', 'eventType'])
@Index(['createdAt'])
export class OutboxEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ name: 'event_type', type: 'enum', enum: OutboxEventType })
  eventType!: OutboxEventType;

  @Column({ type: 'jsonb' })
  payload!: LedgerEntryCreatedPayload;

  @Column({ name: 'dedupe_key' })
  dedupeKey!: string;

  @Column({
    type: 'enum',
    enum: OutboxStatus,
    default: OutboxStatus.PENDING,
  })
  status!: OutboxStatus;

  @Column({ name: 'retry_count', default: 0 })
  retryCount!: number;

  @Column({ name: 'max_retries', default: 3 })
  maxRetries!: number;

  @Column({ name: 'scheduled_for', type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  scheduledFor!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
