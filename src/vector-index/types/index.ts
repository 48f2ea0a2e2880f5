export * from './vector-index.types';
