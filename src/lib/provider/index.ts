export * from './common-scopes';
export * from './filter-compiler';
export * from './filter-group';
export * from './query-parser';
export * from './sort-compiler';
export * from './sql-fragment';
export * from './typeorm-sql-runner';
