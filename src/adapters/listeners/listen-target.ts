import type { Server } from 'http';
import { ConfigurationError } from '../../core/errors';

/**
 * First descriptor passed by socket activation
 */
export const LISTEN_FDS_START = 3;

/**
 * Where the HTTP server accepts connections
 */
export type ListenTarget =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'unix'; path: string }
  | { kind: 'inherited'; fd: number };

/**
 * Listener settings as read from configuration
 */
export interface ListenConfig {
  bind?: { host: string; port: number };
  socket?: string;
}

/**
 * Pick the listener: `bind`, then `socket`, then an inherited descriptor
 */
export function resolveListenTarget(
  config: ListenConfig,
  env: NodeJS.ProcessEnv = process.env,
  pid: number = process.pid,
): ListenTarget {
  if (config.bind) {
    return { kind: 'tcp', host: config.bind.host, port: config.bind.port };
  }

  if (config.socket) {
    return { kind: 'unix', path: config.socket };
  }

  const fd = inheritedDescriptor(env, pid);
  if (fd !== undefined) {
    return { kind: 'inherited', fd };
  }

  throw new ConfigurationError(
    'Either `bind` or `socket` in the configuration, or `$LISTEN_FDS`, must be provided',
  );
}

function inheritedDescriptor(env: NodeJS.ProcessEnv, pid: number): number | undefined {
  const count = Number.parseInt(env.LISTEN_FDS ?? '', 10);
  if (!Number.isInteger(count) || count < 1) {
    return undefined;
  }

  // Descriptors meant for another process are not ours to take
  if (env.LISTEN_PID !== undefined && env.LISTEN_PID !== String(pid)) {
    return undefined;
  }

  return LISTEN_FDS_START;
}

export function describeListenTarget(target: ListenTarget): string {
  switch (target.kind) {
    case 'tcp':
      return `http://${target.host}:${target.port}`;
    case 'unix':
      return `unix:${target.path}`;
    case 'inherited':
      return `inherited descriptor ${target.fd}`;
  }
}

/**
 * Start accepting connections on the target
 */
export function listenOn(server: Server, target: ListenTarget): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);

    const onListening = () => {
      server.off('error', onError);
      resolve();
    };

    switch (target.kind) {
      case 'tcp':
        server.listen(target.port, target.host, onListening);
        break;
      case 'unix':
        server.listen(target.path, onListening);
        break;
      case 'inherited':
        server.listen({ fd: target.fd }, onListening);
        break;
    }
  });
}
