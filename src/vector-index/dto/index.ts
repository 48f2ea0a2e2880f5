export * from './search-options.dto';
export * from './search-request.dto';
