export * from './env.validation';
export * from './kassa-env.config';
