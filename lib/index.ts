export * from './constant';
export * from './errors';
export * from './row';
export * from './validation';
export * from './pager';
export * from './cursor';
export * from './table';
export * from './database';
export * from './statement';
export * from './cli';
