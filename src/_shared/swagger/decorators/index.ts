export * from './dispatch.decorators';
