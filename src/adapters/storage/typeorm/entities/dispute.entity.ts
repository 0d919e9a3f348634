import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { DisputeStatus } from '../../../../core';
import { bigintTransformer } from './column.transformers';

/**
 * TypeORM entity for DisputeRecord
 */
@Entity('payment_disputes')
@Index(['provider', 'providerDisputeId'], { unique: true })
@Index(['tenantId', 'customerId'])
export class DisputeEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column()
  provider!: string;

  @Column({ name: 'provider_dispute_id' })
  providerDisputeId!: string;

  @Column({ name: 'provider_event_id' })
  providerEventId!: string;

  @Column({ name: 'customer_id' })
  customerId!: string;

  @Column({ type: 'bigint', transformer: bigintTransformer })
  amount!: number;

  @Column({ length: 3 })
  currency!: string;

  @Column({ type: 'text', default: '' })
  reason!: string;

  @Column({ type: 'enum', enum: DisputeStatus })
  status!: DisputeStatus;

  @Column({ name: 'raw_payload', type: 'jsonb' })
  rawPayload!: Record<string, unknown>;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
