/**
 * Kassa - payment webhook ingestion with a double-entry ledger
 */

export * from './kassa';
