export * from './structured-errors';
export * from './response-helpers';
