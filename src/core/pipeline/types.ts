import { DispatchStatus } from '../domain/enums';
import { HookDescriptor, HookRunReport } from '../domain/models';
import { HookLogger } from '../interfaces';
import { LifecycleSupervisor, ProcessLauncher } from '../process';
import { HookRegistry } from '../registry';
import { ParsedSignature } from '../signature';
import type { BodyStreamer } from './body-streamer';

/**
 * Request body as the HTTP layer hands it over: lazy, finite, read once
 */
export type BodySource = AsyncIterable<Buffer | Uint8Array | string>;

/**
 * What the dispatcher needs from an inbound request
 */
export interface DispatchRequest {
  /**
   * Path without query string, matched verbatim
   */
  path: string;

  /**
   * Raw `x-hub-signature` header value, if sent
   */
  signatureHeader?: string;

  body: BodySource;
}

export type RejectedStatus =
  | DispatchStatus.NOT_FOUND
  | DispatchStatus.UNAUTHORIZED
  | DispatchStatus.MALFORMED_SIGNATURE
  | DispatchStatus.UNSUPPORTED_ALGORITHM;

/**
 * Synchronous routing and header decision for one request
 */
export type DispatchDecision =
  | {
      status: DispatchStatus.ACCEPTED;
      hook: HookDescriptor;
      signature?: ParsedSignature;
    }
  | { status: RejectedStatus; hook?: HookDescriptor };

/**
 * Result handed back to the HTTP layer
 */
export interface DispatchResult {
  dispatchId: string;
  status: DispatchStatus;

  /**
   * Background run of an accepted dispatch; failures inside it are reported, not thrown
   */
  completion?: Promise<HookRunReport>;

  error?: Error;
}

/**
 * Dispatcher configuration
 */
export interface DispatcherConfig {
  registry: HookRegistry;
  launcher?: ProcessLauncher;
  streamer?: BodyStreamer;
  supervisor?: LifecycleSupervisor;

  /**
   * Global timeout in seconds for hooks without their own (0 = unlimited)
   */
  timeoutSeconds?: number;

  logger?: HookLogger;
}
