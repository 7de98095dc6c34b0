export * from './actions';
export * from './errors';
