export * from './payment-event-type.enum';
export * from './dispute.enum';
export * from './ledger.enum';
export * from './audit-action.enum';
export * from './outbox-status.enum';
