export * from './config';
export * from './errors';
export * from './logger';
export * from './server';
export type * from './types';
