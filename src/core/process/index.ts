export * from './types';
export { HookProcessHandle } from './hook-process';
export { ProcessLauncher } from './process-launcher';
export {
  LifecycleSupervisor,
  MAX_TIMER_DELAY_MS,
  describeExit,
} from './lifecycle-supervisor';
