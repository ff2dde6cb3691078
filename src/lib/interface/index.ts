export * from './filter.interface';
export * from './pagination.interface';
export * from './query-params.interface';
export * from './queryable.interface';
export * from './relationship.interface';
export * from './sort.interface';
export * from './sql.interface';
