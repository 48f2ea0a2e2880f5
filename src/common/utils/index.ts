export * from './type-guards';
