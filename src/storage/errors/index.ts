export * from './storage.errors';
