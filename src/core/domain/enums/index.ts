export * from './signature-verdict.enum';
export * from './dispatch-status.enum';
export * from './body-delivery.enum';
export * from './hook-run-status.enum';
