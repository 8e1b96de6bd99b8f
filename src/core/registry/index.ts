export { HookRegistry } from './hook-registry';
