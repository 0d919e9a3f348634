import { LedgerDirection, LedgerSourceType } from '../enums';

export interface LedgerAccount {
  id: string;
  tenantId: string;
  code: string;
  name: string;
  createdAt: Date;
}

/**
 * Immutable entry header. Unique on (tenantId, sourceType, sourceId)
 */
export interface LedgerEntry {
  id: string;
  tenantId: string;
  sourceType: LedgerSourceType;
  sourceId: string;
  currency: string;
  occurredAt: Date;
  createdAt: Date;
}

export interface LedgerEntryLine {
  id: string;
  ledgerEntryId: string;
  accountId: string;
  direction: LedgerDirection;
  currency: string;
  amount: number;
}
