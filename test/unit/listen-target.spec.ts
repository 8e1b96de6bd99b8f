import { createServer } from 'http';
import {
  ConfigurationError,
  describeListenTarget,
  listenOn,
  resolveListenTarget,
} from '../../src';

describe('Listen target', () => {
  describe('resolveListenTarget', () => {
    it('should prefer bind over everything else', () => {
      const target = resolveListenTarget(
        { bind: { host: '127.0.0.1', port: 8080 }, socket: '/tmp/hookrelay.sock' },
        { LISTEN_FDS: '1' },
        100,
      );

      expect(target).toEqual({ kind: 'tcp', host: '127.0.0.1', port: 8080 });
    });

    it('should use the socket path when bind is absent', () => {
      const target = resolveListenTarget({ socket: '/tmp/hookrelay.sock' }, { LISTEN_FDS: '1' }, 100);

      expect(target).toEqual({ kind: 'unix', path: '/tmp/hookrelay.sock' });
    });

    it('should take descriptor 3 under socket activation', () => {
      expect(resolveListenTarget({}, { LISTEN_FDS: '1' }, 100)).toEqual({
        kind: 'inherited',
        fd: 3,
      });
      expect(resolveListenTarget({}, { LISTEN_FDS: '2', LISTEN_PID: '100' }, 100)).toEqual({
        kind: 'inherited',
        fd: 3,
      });
    });

    it('should ignore descriptors meant for another process', () => {
      expect(() => resolveListenTarget({}, { LISTEN_FDS: '1', LISTEN_PID: '200' }, 100)).toThrow(
        ConfigurationError,
      );
    });

    it('should fail without any listener', () => {
      expect(() => resolveListenTarget({}, {}, 100)).toThrow(
        'Either `bind` or `socket` in the configuration, or `$LISTEN_FDS`, must be provided',
      );
      expect(() => resolveListenTarget({}, { LISTEN_FDS: '0' }, 100)).toThrow(ConfigurationError);
      expect(() => resolveListenTarget({}, { LISTEN_FDS: 'abc' }, 100)).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('describeListenTarget', () => {
    it('should describe every kind of target', () => {
      expect(describeListenTarget({ kind: 'tcp', host: '0.0.0.0', port: 9000 })).toBe(
        'http://0.0.0.0:9000',
      );
      expect(describeListenTarget({ kind: 'unix', path: '/run/hooks.sock' })).toBe(
        'unix:/run/hooks.sock',
      );
      expect(describeListenTarget({ kind: 'inherited', fd: 3 })).toBe('inherited descriptor 3');
    });
  });

  describe('listenOn', () => {
    it('should listen on a TCP port', async () => {
      const server = createServer((_req, res) => res.end());

      await listenOn(server, { kind: 'tcp', host: '127.0.0.1', port: 0 });

      expect(server.listening).toBe(true);
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should reject when the address is taken', async () => {
      const first = createServer();
      await listenOn(first, { kind: 'tcp', host: '127.0.0.1', port: 0 });
      const address = first.address();
      if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
      }

      const second = createServer();
      await expect(
        listenOn(second, { kind: 'tcp', host: '127.0.0.1', port: address.port }),
      ).rejects.toThrow('EADDRINUSE');

      await new Promise<void>((resolve) => first.close(() => resolve()));
    });
  });
});
