export * from './adapter-registry';
