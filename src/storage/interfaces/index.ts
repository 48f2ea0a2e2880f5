export * from './storage-metadata.interface';
export * from './storage-provider.interface';
