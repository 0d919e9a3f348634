export { ProviderConfigEntity } from './provider-config.entity';
export { PaymentEventEntity } from './payment-event.entity';
export { DisputeEntity } from './dispute.entity';
export { InvoiceEntity } from './invoice.entity';
export { LedgerAccountEntity } from './ledger-account.entity';
export { LedgerEntryEntity } from './ledger-entry.entity';
export { LedgerEntryLineEntity } from './ledger-entry-line.entity';
export { AuditLogEntity } from './audit-log.entity';
export { OutboxEventEntity } from './outbox-event.entity';
export { bigintTransformer } from './column.transformers';

import { ProviderConfigEntity } from './provider-config.entity';
import { PaymentEventEntity } from './payment-event.entity';
import { DisputeEntity } from './dispute.entity';
import { InvoiceEntity } from './invoice.entity';
import { LedgerAccountEntity } from './ledger-account.entity';
import { LedgerEntryEntity } from './ledger-entry.entity';
import { LedgerEntryLineEntity } from './ledger-entry-line.entity';
import { AuditLogEntity } from './audit-log.entity';
import { OutboxEventEntity } from './outbox-event.entity';

export const KASSA_ENTITIES = [
  ProviderConfigEntity,
  PaymentEventEntity,
  DisputeEntity,
  InvoiceEntity,
  LedgerAccountEntity,
  LedgerEntryEntity,
  LedgerEntryLineEntity,
  AuditLogEntity,
  OutboxEventEntity,
];
