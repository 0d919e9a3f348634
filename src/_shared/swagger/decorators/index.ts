/**
 * Swagger decorators, kept out of the controllers
 */

export * from './webhook.decorators';
export * from './health.decorators';
