export { DispatchController } from './dispatch.controller';
