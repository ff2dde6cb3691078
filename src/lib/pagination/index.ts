export * from './cursor-codec';
export * from './cursor-where';
export * from './pagination';
export * from './pagination-result';
export * from './pagination.config';
