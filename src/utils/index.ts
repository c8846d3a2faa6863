export * from './logger';
export * from './file-utils';
export * from './list-utils';
export * from './number-utils';
export * from './uuid';
