import { LogLevel, ModuleMetadata } from '@nestjs/common';
import {
  DEFAULT_BODY_LIMIT,
  DEFAULT_TIMEOUT_SECONDS,
  HookDefinition,
} from '../../core';

/**
 * hookrelay Module Configuration
 */
export interface HookRelayModuleConfig {
  /**
   * Path → program bindings; a repeated path keeps its last entry
   */
  hooks: HookDefinition[];

  /**
   * Seconds a hook may run before it is killed (0 = unlimited)
   * Default: 60
   */
  timeout?: number;

  /**
   * Largest body buffered for a hook with a secret, in bytes
   * Default: 10 MiB
   */
  bodyLimit?: number;

  /**
   * TCP listener
   */
  bind?: {
    host: string;
    port: number;
  };

  /**
   * Unix-domain socket listener, used when `bind` is absent
   */
  socket?: string;

  /**
   * OpenAPI page for the dispatch endpoint
   */
  docs?: {
    enabled?: boolean;
    path?: string;
  };
}

/**
 * Configuration with every default applied
 */
export type ResolvedHookRelayConfig = HookRelayModuleConfig & {
  timeout: number;
  bodyLimit: number;
  docs: { enabled: boolean; path: string };
};

/**
 * Async configuration factory
 */
export interface HookRelayModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: Array<string | symbol>;
  useFactory(
    ...args: unknown[]
  ): Promise<HookRelayModuleConfig> | HookRelayModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultHookRelayConfig = {
  timeout: DEFAULT_TIMEOUT_SECONDS,
  bodyLimit: DEFAULT_BODY_LIMIT,
  docs: {
    enabled: false,
    path: '/_docs',
  },
};

export function resolveHookRelayConfig(
  config: HookRelayModuleConfig,
): ResolvedHookRelayConfig {
  return {
    ...config,
    timeout: config.timeout ?? defaultHookRelayConfig.timeout,
    bodyLimit: config.bodyLimit ?? defaultHookRelayConfig.bodyLimit,
    docs: {
      enabled: config.docs?.enabled ?? defaultHookRelayConfig.docs.enabled,
      path: config.docs?.path ?? defaultHookRelayConfig.docs.path,
    },
  };
}

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Nest log levels enabled by a `LOG_LEVEL` value
 *
 * The named level and everything more severe. Unknown or empty values
 * fall back to `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const wanted = (level ?? '').trim().toLowerCase();
  const index = LOG_LEVELS.findIndex((candidate) => candidate === wanted);
  const cutoff = index >= 0 ? index : LOG_LEVELS.indexOf('log');
  return LOG_LEVELS.slice(0, cutoff + 1);
}
