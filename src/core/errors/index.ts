export * from './ingestion.errors';
