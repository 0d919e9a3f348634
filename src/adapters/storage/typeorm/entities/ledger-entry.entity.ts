import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { LedgerSourceType } from '../../../../core';

/**
 * Ledger entry header. One per (tenant, source type, source id)
 */
@Entity('ledger_entries')
@Index(['tenantId', 'sourceType', 'sourceId'], { unique: true })
export class LedgerEntryEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ name: 'source_type', type: 'enum', enum: LedgerSourceType })
  sourceType!: LedgerSourceType;

  @Column({ name: 'source_id' })
  sourceId!: string;

  @Column({ length: 3 })
  currency!: string;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
