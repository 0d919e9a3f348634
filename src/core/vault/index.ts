export * from './credential-vault';
