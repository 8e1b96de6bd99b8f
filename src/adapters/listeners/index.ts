export * from './listen-target';
