/**
 * Kassa Shared Resources
 */

// DTOs for Swagger documentation
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';
