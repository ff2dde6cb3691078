export * from './include-tree';
export * from './relationship';
export * from './relationship-planner';
