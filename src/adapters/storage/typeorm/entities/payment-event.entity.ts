import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { PaymentEventType } from '../../../../core';

/**
 * TypeORM entity for PaymentEventRecord
 */
@Entity('payment_events')
@Index(['provider', 'providerEventId'], { unique: true })
@Index(['tenantId', 'customerId'])
export class PaymentEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column()
  provider!: string;

  @Column({ name: 'provider_event_id' })
  providerEventId!: string;

  @Column({ name: 'event_type', type: 'enum', enum: PaymentEventType })
  eventType!: PaymentEventType;

  @Column({ name: 'customer_id' })
  customerId!: string;

  @Column({ name: 'raw_payload', type: 'jsonb' })
  rawPayload!: Record<string, unknown>;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
