export * from './ledger.service';
export * from './invoice-settlement';
export * from './dispute-status';
export * from './payment-event.processor';
export * from './dispute-event.processor';
export * from './webhook-ingestion.service';
export * from './provider-config.service';
