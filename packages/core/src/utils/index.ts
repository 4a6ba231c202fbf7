export * from './logger';
export * from './validation';
