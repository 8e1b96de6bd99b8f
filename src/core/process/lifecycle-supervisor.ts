import { Logger } from '@nestjs/common';
import { HookRunStatus } from '../domain/enums';
import { ProcessExit, SupervisionReport } from '../domain/models';
import { HookLogger } from '../interfaces';
import { HookProcessHandle } from './hook-process';
import { toError } from './types';

type ExitResult =
  | { kind: 'exited'; exit: ProcessExit }
  | { kind: 'wait_failed'; error: Error };

type RaceResult = ExitResult | { kind: 'timer' };

/**
 * Longest delay a single Node timer honours; longer ones fire after 1 ms
 */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Call `onFire` after `delayMs`, chaining timers past the Node limit
 *
 * Returns a function that cancels whatever timer is pending.
 */
function startTimer(delayMs: number, onFire: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;

  const schedule = (remaining: number) => {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      if (remaining > step) {
        schedule(remaining - step);
      } else {
        onFire();
      }
    }, step);
  };
  schedule(delayMs);

  return () => clearTimeout(timer);
}

/**
 * Describe an exit the way the log expects it
 */
export function describeExit(exit: ProcessExit): string {
  if (exit.signal) {
    return `terminated by signal ${exit.signal}`;
  }
  return `exit status: ${exit.code}`;
}

/**
 * Lifecycle Supervisor
 *
 * Waits for a hook process to end, bounded by a timeout in seconds.
 * Zero waits forever. When the timer fires first the process gets SIGKILL
 * and is then reaped. A process whose exit is already observable when
 * the timer fires is treated as exited, never killed.
 */
export class LifecycleSupervisor {
  constructor(
    private readonly logger: HookLogger = new Logger(LifecycleSupervisor.name),
  ) {}

  async supervise(
    handle: HookProcessHandle,
    timeoutSeconds: number,
    label = `pid ${handle.pid}`,
  ): Promise<SupervisionReport> {
    const startTime = Date.now();
    const waiting = this.observeExit(handle);

    if (timeoutSeconds <= 0) {
      return this.report(label, await waiting, startTime);
    }

    let cancel: (() => void) | undefined;
    const timeout = new Promise<RaceResult>((resolve) => {
      cancel = startTimer(timeoutSeconds * 1000, () => resolve({ kind: 'timer' }));
    });

    let result: RaceResult;
    try {
      result = await Promise.race([waiting, timeout]);
    } finally {
      cancel?.();
    }

    if (result.kind === 'timer' && handle.hasExited()) {
      result = await waiting;
    }

    if (result.kind !== 'timer') {
      return this.report(label, result, startTime);
    }

    this.logger.warn(
      `Timed out waiting for hook ${label} after ${timeoutSeconds}s; killing it`,
    );
    if (!handle.kill('SIGKILL')) {
      this.logger.error(`Failed to send SIGKILL to hook ${label}`);
    }

    const reaped = await waiting;
    if (reaped.kind === 'exited') {
      this.logger.log(`Hook ${label} reaped after timeout, ${describeExit(reaped.exit)}`);
      return {
        status: HookRunStatus.TIMED_OUT,
        exit: reaped.exit,
        durationMs: Date.now() - startTime,
      };
    }

    this.logger.error(`Error reaping hook ${label}: ${reaped.error.message}`);
    return {
      status: HookRunStatus.TIMED_OUT,
      error: reaped.error,
      durationMs: Date.now() - startTime,
    };
  }

  private observeExit(handle: HookProcessHandle): Promise<ExitResult> {
    return handle.wait().then(
      (exit): ExitResult => ({ kind: 'exited', exit }),
      (error: unknown): ExitResult => ({ kind: 'wait_failed', error: toError(error) }),
    );
  }

  private report(
    label: string,
    result: ExitResult,
    startTime: number,
  ): SupervisionReport {
    const durationMs = Date.now() - startTime;

    if (result.kind === 'exited') {
      this.logger.log(`Hook ${label} exited. ${describeExit(result.exit)}`);
      return { status: HookRunStatus.EXITED, exit: result.exit, durationMs };
    }

    this.logger.error(`Error waiting for hook ${label}: ${result.error.message}`);
    return { status: HookRunStatus.WAIT_FAILED, error: result.error, durationMs };
  }
}
