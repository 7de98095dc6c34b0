export * from './auth';
export * from './cloudId';
export * from './config';
export * from './connection';
export * from './errors';
export * from './pool';
export * from './selector';
export * from './serializer';
export * from './transport';
export * from './types';
export * from './version';
