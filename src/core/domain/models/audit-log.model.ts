import { AuditAction, AuditTargetType } from '../enums';

export type AuditMetadataValue = string | number | boolean | null;

/**
 * AuditLog - append-only record of what the pipeline did and to which row
 */
export class AuditLog {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly action: AuditAction,
    public readonly targetType: AuditTargetType,
    public readonly targetId: string,
    public readonly metadata: Record<string, AuditMetadataValue> = {},
    public readonly createdAt: Date = new Date(),
  ) {}
}
