export * from './listeners';
