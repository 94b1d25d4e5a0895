export * from './logger';
export * from './errors';
export * from './dates';
export * from './validation';
export * from './json';
