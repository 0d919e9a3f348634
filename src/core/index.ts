/**
 * Kassa core - ingestion pipeline and ledger, independent of HTTP and of
 * the database driver
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Errors
export * from './errors';

// Interfaces and contracts
export * from './interfaces';

// Credentials and provider lookup
export * from './vault';
export * from './registry';

// Core services
export * from './services';

// Event system
export * from './events';
