/**
 * Terminal state of a supervised hook process
 */
export enum HookRunStatus {
  EXITED = 'exited',
  TIMED_OUT = 'timed_out',
  WAIT_FAILED = 'wait_failed',
}
