export * from './PageView';
