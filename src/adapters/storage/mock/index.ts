export { MockStorageAdapter, MockStorageOptions } from './mock-storage.adapter';
