export * from './base';
export * from './client';
export * from './helpers';
export * from './types';
export * from './utils';
