export * from './hook-descriptor.model';
export * from './run-report.model';
