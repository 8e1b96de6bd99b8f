import { registerAs } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { ServerConfigDto } from '../../../_shared/dto';
import { ConfigurationError, toError } from '../../../core';
import { HookRelayModuleConfig } from '../hookrelay.config';

export const CONFIG_PATH_ENV = 'HOOKRELAY_CONFIG';
export const DEFAULT_CONFIG_PATH = 'webhook.yaml';

export function configPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH;
}

/**
 * Validate a parsed configuration document
 */
export function parseServerConfig(
  raw: unknown,
  source = 'configuration',
): HookRelayModuleConfig {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`Invalid ${source}`, ['document must be a mapping']);
  }

  const dto = plainToInstance(ServerConfigDto, raw);
  const errors = validateSync(dto, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid ${source}`, describeErrors(errors));
  }

  return {
    bind: dto.bind && { host: dto.bind.host, port: dto.bind.port },
    socket: dto.socket,
    timeout: dto.timeout,
    bodyLimit: dto.bodyLimit,
    docs: dto.docs && { enabled: dto.docs.enabled, path: dto.docs.path },
    hooks: dto.hooks.map((hook) => ({
      path: hook.path,
      program: hook.program,
      args: hook.args,
      secret: hook.secret,
      timeout: hook.timeout,
    })),
  };
}

/**
 * Read, parse and validate a YAML configuration file
 */
export function loadConfigFile(path: string): HookRelayModuleConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to open \`${path}\``, [toError(error).message]);
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse \`${path}\``, [toError(error).message]);
  }

  return parseServerConfig(raw, `\`${path}\``);
}

function describeErrors(errors: ValidationError[], parent?: string): string[] {
  return errors.flatMap((error) => {
    const field = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${field}: ${message}`,
    );
    return [...own, ...describeErrors(error.children ?? [], field)];
  });
}

/**
 * `@nestjs/config` namespace holding the server configuration
 */
export const hookRelayConfig = registerAs('hookrelay', () =>
  loadConfigFile(configPathFromEnv()),
);
