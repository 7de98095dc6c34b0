export * from './errors';
export * from './format';
export * from './generate';
export * from './model';
export * from './module';
export * from './renderer';
export * from './specReader';
export * from './unasync';
