export * from './hookrelay-config.loader';
