import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { EncryptedEnvelope } from '../../../../core';

/**
 * TypeORM entity for per-tenant provider credentials
 */
@Entity('payment_provider_configs')
@Index(['tenantId', 'provider'], { unique: true })
@Index(['provider', 'isActive'])
export class ProviderConfigEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column()
  provider!: string;

  @Column({ name: 'encrypted_config', type: 'jsonb' })
  encryptedConfig!: EncryptedEnvelope;

  @Column({ name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
