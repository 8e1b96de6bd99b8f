import { BodyDelivery, HookRunStatus } from '../enums';

/**
 * How a process ended: exactly one of `code` and `signal` is set
 */
export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Result of draining a request body into a hook's stdin
 */
export interface BodyDeliveryReport {
  delivery: BodyDelivery;
  bytesForwarded: number;
  error?: Error;
}

/**
 * Result of supervising a hook process until it is reaped
 */
export interface SupervisionReport {
  status: HookRunStatus;
  exit?: ProcessExit;
  error?: Error;
  durationMs: number;
}

/**
 * Everything the background run of one dispatch observed
 */
export interface HookRunReport {
  dispatchId: string;
  path: string;
  pid?: number;
  body: BodyDeliveryReport;
  supervision: SupervisionReport;
}
