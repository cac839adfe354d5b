export * from './summary';
export * from './metrics';
export * from './time-series';
export * from './breakdown';
export * from './filter-options';
