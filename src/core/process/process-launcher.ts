import { Logger } from '@nestjs/common';
import { ChildProcess, spawn } from 'child_process';
import { HookDescriptor, formatHookCommand } from '../domain/models';
import { HookLogger } from '../interfaces';
import { HookProcessHandle } from './hook-process';
import { SpawnFailureError, toError } from './types';

/**
 * Process Launcher
 *
 * Starts a hook's program with a fresh pipe on stdin. stdout, stderr and
 * the environment are inherited from the server. The returned promise
 * settles only after the child has actually spawned, so a missing or
 * non-executable program is reported as a `SpawnFailureError`.
 */
export class ProcessLauncher {
  constructor(
    private readonly logger: HookLogger = new Logger(ProcessLauncher.name),
  ) {}

  async launch(hook: HookDescriptor): Promise<HookProcessHandle> {
    const command = formatHookCommand(hook);
    this.logger.log(`Executing hook ${hook.path}: ${command}`);

    let child: ChildProcess;
    try {
      child = spawn(hook.program, [...hook.args], {
        stdio: ['pipe', 'inherit', 'inherit'],
        shell: false,
      });
    } catch (error) {
      throw this.fail(command, toError(error));
    }

    const stdin = child.stdin;
    if (!stdin) {
      child.kill('SIGKILL');
      throw this.fail(command, new Error('stdin pipe is unavailable'));
    }

    // Attach the handle's listeners before anything can be emitted
    const handle = new HookProcessHandle(child, stdin, command, this.logger);

    try {
      await waitForSpawn(child);
    } catch (error) {
      throw this.fail(command, toError(error));
    }

    this.logger.debug(`Hook ${hook.path} started as pid ${handle.pid}`);
    return handle;
  }

  private fail(command: string, cause: Error): SpawnFailureError {
    const failure = new SpawnFailureError(
      `Failed to execute command \`${command}\`: ${cause.message}`,
      command,
      cause,
    );
    this.logger.error(failure.message);
    return failure;
  }
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}
