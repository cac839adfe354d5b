export * from './ReportingEngine';
