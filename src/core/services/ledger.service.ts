import { Logger } from '@nestjs/common';
import {
  AuditAction,
  AuditTargetType,
  LedgerAccountCode,
  LedgerDirection,
  LedgerSourceType,
  OutboxEventType,
} from '../domain/enums';
import { LedgerAccount, LedgerEntry } from '../domain/models';
import { LedgerInvariantError } from '../errors';
import { PipelineMetrics, StorageAdapter } from '../interfaces';

export interface LedgerLineInput {
  accountId: string;
  /** 'debit' or 'credit', case-insensitive */
  direction: string;
  /** Integer minor units */
  amount: number;
}

export interface CreateLedgerEntryInput {
  tenantId: string;
  sourceType: string;
  sourceId: string;
  currency: string;
  occurredAt: Date;
  lines: LedgerLineInput[];
}

export interface CreateLedgerEntryResult {
  /** false when an entry for the same source already existed */
  created: boolean;
  entry: LedgerEntry | null;
}

export interface LedgerServiceOptions {
  /** Delivery attempts before a ledger notification is dead-lettered */
  outboxMaxRetries?: number;
}

interface ValidatedEntry {
  tenantId: string;
  sourceType: LedgerSourceType;
  sourceId: string;
  currency: string;
  occurredAt: Date;
  lines: Array<{ accountId: string; direction: LedgerDirection; amount: number }>;
  total: number;
}

/**
 * Display names used when an account is created lazily
 */
export const LEDGER_ACCOUNT_NAMES: Record<LedgerAccountCode, string> = {
  [LedgerAccountCode.ACCOUNTS_RECEIVABLE]: 'Accounts Receivable',
  [LedgerAccountCode.CASH]: 'Cash',
  [LedgerAccountCode.REVENUE_USAGE]: 'Usage Revenue',
  [LedgerAccountCode.REVENUE_FLAT]: 'Flat Revenue',
  [LedgerAccountCode.TAX_PAYABLE]: 'Tax Payable',
  [LedgerAccountCode.CREDIT_BALANCE]: 'Customer Credit Balance',
  [LedgerAccountCode.REFUND_LIABILITY]: 'Refund / Dispute Liability',
  [LedgerAccountCode.PAYMENT_FEE_EXPENSE]: 'Payment Fee Expense',
  [LedgerAccountCode.ADJUSTMENT]: 'Adjustments',
};

const SOURCE_TYPES: ReadonlySet<string> = new Set(Object.values(LedgerSourceType));

/**
 * Ledger posting engine
 *
 * Entries are balanced, append-only and idempotent by
 * (tenantId, sourceType, sourceId). Lines, the outbox notification and the
 * audit record commit in the same transaction as the header.
 */
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    private readonly storage: StorageAdapter,
    private readonly metrics?: PipelineMetrics,
    private readonly options: LedgerServiceOptions = {},
  ) {}

  /**
   * Post a balanced entry. Pass `tx` to join a caller's transaction.
   */
  async createEntry(
    input: CreateLedgerEntryInput,
    tx?: StorageAdapter,
  ): Promise<CreateLedgerEntryResult> {
    const entry = validateEntry(input);

    const result = await (tx ?? this.storage).withTransaction(async (storage) => {
      const header = await storage.insertLedgerEntry({
        tenantId: entry.tenantId,
        sourceType: entry.sourceType,
        sourceId: entry.sourceId,
        currency: entry.currency,
        occurredAt: entry.occurredAt,
      });
      if (!header) {
        return { created: false, entry: null };
      }

      await storage.insertLedgerEntryLines(
        entry.lines.map((line) => ({
          ledgerEntryId: header.id,
          accountId: line.accountId,
          direction: line.direction,
          currency: entry.currency,
          amount: line.amount,
        })),
      );

      await storage.insertOutboxEvent({
        tenantId: entry.tenantId,
        eventType: OutboxEventType.LEDGER_ENTRY_CREATED,
        payload: {
          ledger_entry_id: header.id,
          source_type: entry.sourceType,
          source_id: entry.sourceId,
        },
        dedupeKey: `ledger_entry:${header.id}`,
        maxRetries: this.options.outboxMaxRetries,
      });

      await storage.createAuditLog({
        tenantId: entry.tenantId,
        action: AuditAction.LEDGER_ENTRY_CREATED,
        targetType: AuditTargetType.LEDGER_ENTRY,
        targetId: header.id,
        metadata: {
          source_type: entry.sourceType,
          source_id: entry.sourceId,
          currency: entry.currency,
          line_count: entry.lines.length,
          total: entry.total,
        },
      });

      return { created: true, entry: header };
    });

    if (result.created) {
      this.metrics?.recordLedgerEntry(entry.sourceType);
    } else {
      this.logger.debug(
        `Ledger entry already exists for ${entry.sourceType}/${entry.sourceId}`,
      );
    }
    return result;
  }

  /**
   * Find or lazily create the tenant's account for `code`
   */
  async ensureAccount(
    tenantId: string,
    code: string,
    name: string,
    tx?: StorageAdapter,
  ): Promise<LedgerAccount> {
    const storage = tx ?? this.storage;
    const tenant = tenantId.trim();
    const accountCode = code.trim();
    if (!tenant || !accountCode) {
      throw new LedgerInvariantError('ledger account requires tenant and code');
    }

    const existing = await storage.findLedgerAccount(tenant, accountCode);
    if (existing) {
      return existing;
    }

    await storage.insertLedgerAccount({
      tenantId: tenant,
      code: accountCode,
      name: name.trim() || accountCode,
    });

    const account = await storage.findLedgerAccount(tenant, accountCode);
    if (!account) {
      throw new LedgerInvariantError(`ledger account ${accountCode} could not be created`);
    }
    return account;
  }
}

function validateEntry(input: CreateLedgerEntryInput): ValidatedEntry {
  const tenantId = input.tenantId.trim();
  const sourceType = input.sourceType.trim();
  const sourceId = input.sourceId.trim();
  const currency = input.currency.trim().toUpperCase();

  if (!tenantId) {
    throw new LedgerInvariantError('ledger entry requires a tenant');
  }
  if (!isSourceType(sourceType)) {
    throw new LedgerInvariantError(`unknown ledger source type: ${input.sourceType}`);
  }
  if (!sourceId) {
    throw new LedgerInvariantError('ledger entry requires a source id');
  }
  if (!currency) {
    throw new LedgerInvariantError('ledger entry requires a currency');
  }
  if (Number.isNaN(input.occurredAt.getTime())) {
    throw new LedgerInvariantError('ledger entry requires an occurrence time');
  }
  if (input.lines.length < 2) {
    throw new LedgerInvariantError('ledger entry requires at least two lines');
  }

  let debits = 0;
  let credits = 0;
  const lines = input.lines.map((line) => {
    const accountId = line.accountId.trim();
    const direction = parseDirection(line.direction);
    if (!accountId) {
      throw new LedgerInvariantError('ledger line requires an account');
    }
    if (!Number.isInteger(line.amount) || line.amount < 0) {
      throw new LedgerInvariantError(`invalid ledger line amount: ${line.amount}`);
    }

    if (direction === LedgerDirection.DEBIT) {
      debits += line.amount;
    } else {
      credits += line.amount;
    }
    return { accountId, direction, amount: line.amount };
  });

  if (debits !== credits) {
    throw new LedgerInvariantError(
      `ledger entry is unbalanced: debits ${debits} != credits ${credits}`,
    );
  }

  return {
    tenantId,
    sourceType,
    sourceId,
    currency,
    occurredAt: input.occurredAt,
    lines,
    total: debits,
  };
}

function isSourceType(value: string): value is LedgerSourceType {
  return SOURCE_TYPES.has(value);
}

function parseDirection(value: string): LedgerDirection {
  switch (value.trim().toLowerCase()) {
    case LedgerDirection.DEBIT:
      return LedgerDirection.DEBIT;
    case LedgerDirection.CREDIT:
      return LedgerDirection.CREDIT;
    default:
      throw new LedgerInvariantError(`invalid ledger line direction: ${value}`);
  }
}
