export * from './payment-event.model';
export * from './payment-event-record.model';
export * from './dispute-record.model';
export * from './ledger.model';
export * from './invoice.model';
export * from './provider-config.model';
export * from './audit-log.model';
export * from './outbox-event.model';
