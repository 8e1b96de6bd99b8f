export * from './logger.interface';
