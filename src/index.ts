import 'reflect-metadata';

export * from './lib/constants';
export * from './lib/dto';
export * from './lib/exception';
export * from './lib/interface';
export * from './lib/pagination';
export * from './lib/provider';
export * from './lib/query-builder';
export * from './lib/query-builder.service';
export * from './lib/query-engine.module';
export * from './lib/relationship';
export * from './lib/resource-definition';
