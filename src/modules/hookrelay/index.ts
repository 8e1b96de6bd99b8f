/**
 * hookrelay NestJS Module
 */

// Main module
export { HookRelayModule } from './hookrelay.module';

// Configuration
export {
  defaultHookRelayConfig,
  resolveHookRelayConfig,
  resolveLogLevels,
} from './hookrelay.config';
export type {
  HookRelayModuleConfig,
  HookRelayModuleAsyncConfig,
  ResolvedHookRelayConfig,
} from './hookrelay.config';
export * from './config';

// Controllers
export { DispatchController } from './controllers';

// Filters
export { EmptyBodyExceptionFilter } from './filters/empty-body-exception.filter';

// Services
export { ConfigurationService } from './services/configuration.service';

// Injection tokens
export * from './constants';
