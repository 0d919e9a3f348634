/**
 * Injection tokens for Kassa module
 */

export const KASSA_CONFIG = Symbol('KASSA_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const ADAPTER_REGISTRY = Symbol('ADAPTER_REGISTRY');
export const CREDENTIAL_VAULT = Symbol('CREDENTIAL_VAULT');
export const INGESTION_METRICS = Symbol('INGESTION_METRICS');
export const LEDGER_SERVICE = Symbol('LEDGER_SERVICE');
export const PAYMENT_EVENT_PROCESSOR = Symbol('PAYMENT_EVENT_PROCESSOR');
export const DISPUTE_EVENT_PROCESSOR = Symbol('DISPUTE_EVENT_PROCESSOR');
export const WEBHOOK_INGESTION_SERVICE = Symbol('WEBHOOK_INGESTION_SERVICE');
export const PROVIDER_CONFIG_SERVICE = Symbol('PROVIDER_CONFIG_SERVICE');
