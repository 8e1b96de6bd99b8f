export * from './hookrelay';
