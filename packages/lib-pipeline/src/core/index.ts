export * from './types';
export * from './message';
export * from './transaction';
export * from './context';
export * from './transition';
export * from './registry';
export * from './executor';
