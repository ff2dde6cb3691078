export * from './query-engine.exception';
