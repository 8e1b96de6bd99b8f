import { ChildProcess } from 'child_process';
import { Writable } from 'stream';
import { ProcessExit } from '../domain/models';
import { HookLogger } from '../interfaces';
import { ProcessWaitError, isBrokenPipe, toError } from './types';

interface Waiter {
  resolve: (exit: ProcessExit) => void;
  reject: (error: ProcessWaitError) => void;
}

/**
 * Handle on one spawned hook program
 *
 * Owns the writable end of the child's stdin and the wait/kill capability.
 * The pipe is ended at most once, whichever path gets there first.
 */
export class HookProcessHandle {
  private exitStatus?: ProcessExit;
  private failure?: ProcessWaitError;
  private waiters: Waiter[] = [];
  private inputClosing?: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    private readonly stdin: Writable,
    readonly command: string,
    private readonly logger: HookLogger,
  ) {
    child.once('exit', (code, signal) => {
      this.exitStatus = { code, signal };
      this.settle();
    });

    child.on('error', (error) => {
      // Errors after exit (e.g. a late kill attempt) have nobody left to tell
      if (this.exitStatus) {
        this.logger.debug(`Hook process ${this.pid} reported after exit: ${error.message}`);
        return;
      }
      this.failure = new ProcessWaitError(
        `Hook process ${this.pid} failed: ${error.message}`,
        this.pid,
        error,
      );
      this.settle();
    });

    // Write and shutdown errors reach their callbacks; this keeps an
    // emitted 'error' from taking the server down.
    stdin.on('error', (error) => {
      if (!isBrokenPipe(error)) {
        this.logger.debug(`stdin of hook process ${this.pid}: ${error.message}`);
      }
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /**
   * Writable end of the child's stdin
   */
  get input(): Writable {
    return this.stdin;
  }

  hasExited(): boolean {
    return this.exitStatus !== undefined;
  }

  /**
   * Resolve once the process has exited
   */
  wait(): Promise<ProcessExit> {
    if (this.exitStatus) {
      return Promise.resolve(this.exitStatus);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Send a signal; false when the process could not be signalled
   */
  kill(signal: NodeJS.Signals = 'SIGKILL'): boolean {
    if (this.exitStatus) {
      return false;
    }
    return this.child.kill(signal);
  }

  /**
   * End the stdin pipe, once
   *
   * Later calls share the first call's promise. A reader that is already
   * gone is not an error.
   */
  closeInput(): Promise<void> {
    if (!this.inputClosing) {
      this.inputClosing = new Promise<void>((resolve, reject) => {
        // Node destroys stdin when the child exits; end() would never call back
        if (this.stdin.destroyed) {
          resolve();
          return;
        }
        this.stdin.end((error?: Error | null) => {
          if (error && !isBrokenPipe(error)) {
            reject(toError(error));
            return;
          }
          resolve();
        });
      });
    }
    return this.inputClosing;
  }

  private settle(): void {
    const waiters = this.waiters;
    this.waiters = [];

    for (const waiter of waiters) {
      if (this.exitStatus) {
        waiter.resolve(this.exitStatus);
      } else if (this.failure) {
        waiter.reject(this.failure);
      }
    }
  }
}
