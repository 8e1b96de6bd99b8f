/**
 * Logging surface the core writes to
 *
 * NestJS's `Logger` satisfies it, so the module layer hands in named
 * Nest loggers and tests hand in recorders.
 */
export interface HookLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, stack?: string): void;
  debug(message: string): void;
}
