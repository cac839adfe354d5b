export * from './FilterParser';
export * from './ReportOptions';
export * from './raw-params';
