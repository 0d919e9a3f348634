import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import {
  AuditAction,
  AuditMetadataValue,
  AuditTargetType,
} from '../../../../core';

/**
 * TypeORM entity for AuditLog
 */
@Entity('audit_logs')
@Index(['tenantId', 'targetType', 'targetId'])
@Index(['action'])
@Index(['createdAt'])
export class AuditLogEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({
    type: 'enum',
    enum: AuditAction,
  })
  action!: AuditAction;

  @Column({ name: 'target_type', type: 'enum', enum: AuditTargetType })
  targetType!: AuditTargetType;

  @Column({ name: 'target_id' })
  targetId!: string;

  @Column({ type: 'jsonb', default: {} })
  metadata!: Record<string, AuditMetadataValue>;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
