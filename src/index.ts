/**
 * Kassa
 *
 * Multi-tenant payment webhook ingestion: per-tenant signature verification,
 * idempotent payment and dispute processing, and double-entry ledger posting.
 */

// Core domain, services and interfaces
export * from './core';

// Adapters
export * from './adapters/providers';
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';

// NestJS module
export * from './modules';

// Environment configuration
export * from './config';
