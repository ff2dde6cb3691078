export * from './cursor-data.dto';
export * from './pagination-query.dto';
