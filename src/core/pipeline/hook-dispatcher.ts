import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DispatchStatus, SignatureVerdict } from '../domain/enums';
import { HookDescriptor, HookRunReport } from '../domain/models';
import { HookLogger } from '../interfaces';
import {
  HookProcessHandle,
  LifecycleSupervisor,
  ProcessLauncher,
  toError,
} from '../process';
import { HookRegistry } from '../registry';
import { ParsedSignature, SignatureContext, parseSignatureHeader } from '../signature';
import { BodyStreamer } from './body-streamer';
import {
  DispatchDecision,
  DispatchRequest,
  DispatchResult,
  DispatcherConfig,
} from './types';

export const DEFAULT_TIMEOUT_SECONDS = 60;

/**
 * Hook Dispatcher
 *
 * Decides what to do with one inbound request and, when accepted, launches
 * the hook before the caller answers. Body transfer, pipe close and then
 * supervision continue in the background; callers that care can await
 * `completion`.
 */
export class HookDispatcher {
  private readonly registry: HookRegistry;
  private readonly launcher: ProcessLauncher;
  private readonly streamer: BodyStreamer;
  private readonly supervisor: LifecycleSupervisor;
  private readonly timeoutSeconds: number;
  private readonly logger: HookLogger;
  private readonly running = new Set<Promise<HookRunReport>>();

  constructor(config: DispatcherConfig) {
    this.registry = config.registry;
    this.launcher = config.launcher ?? new ProcessLauncher();
    this.streamer = config.streamer ?? new BodyStreamer();
    this.supervisor = config.supervisor ?? new LifecycleSupervisor();
    this.timeoutSeconds = config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger = config.logger ?? new Logger(HookDispatcher.name);
  }

  /**
   * Number of background runs not yet finished
   */
  get activeRuns(): number {
    return this.running.size;
  }

  /**
   * Route a request and check its signature header, without touching the body
   */
  decide(path: string, signatureHeader?: string): DispatchDecision {
    const hook = this.registry.lookup(path);
    if (!hook) {
      return { status: DispatchStatus.NOT_FOUND };
    }

    if (!hook.secret) {
      return { status: DispatchStatus.ACCEPTED, hook };
    }

    if (signatureHeader === undefined) {
      return { status: DispatchStatus.UNAUTHORIZED, hook };
    }

    const parsed = parseSignatureHeader(signatureHeader);
    if (!parsed.ok) {
      return {
        status:
          parsed.verdict === SignatureVerdict.UNSUPPORTED_ALGORITHM
            ? DispatchStatus.UNSUPPORTED_ALGORITHM
            : DispatchStatus.MALFORMED_SIGNATURE,
        hook,
      };
    }

    return { status: DispatchStatus.ACCEPTED, hook, signature: parsed.signature };
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const dispatchId = uuidv4();
    const decision = this.decide(request.path, request.signatureHeader);

    if (decision.status !== DispatchStatus.ACCEPTED) {
      this.logger.debug(
        `[${dispatchId}] Request for ${request.path} rejected: ${decision.status}`,
      );
      return { dispatchId, status: decision.status };
    }

    let handle: HookProcessHandle;
    try {
      handle = await this.launcher.launch(decision.hook);
    } catch (error) {
      return { dispatchId, status: DispatchStatus.LAUNCH_FAILED, error: toError(error) };
    }

    const completion = this.run(
      dispatchId,
      decision.hook,
      handle,
      request,
      decision.signature,
    );
    this.track(dispatchId, completion);

    return { dispatchId, status: DispatchStatus.ACCEPTED, completion };
  }

  /**
   * Body transfer, then supervision, of one launched hook
   *
   * Streaming starts before the first await: the body has to be consumed
   * before the HTTP layer finishes the response. The timeout counts from
   * the moment the pipe is closed.
   */
  private async run(
    dispatchId: string,
    hook: HookDescriptor,
    handle: HookProcessHandle,
    request: DispatchRequest,
    parsed?: ParsedSignature,
  ): Promise<HookRunReport> {
    const label = `${hook.path} [${dispatchId}]`;
    const signature =
      parsed && hook.secret ? new SignatureContext(parsed, hook.secret) : undefined;
    const timeoutSeconds = hook.timeoutSeconds ?? this.timeoutSeconds;

    const body = await this.streamer.stream(request.body, handle, signature, label);
    const supervision = await this.supervisor.supervise(handle, timeoutSeconds, label);

    return { dispatchId, path: hook.path, pid: handle.pid, body, supervision };
  }

  private track(dispatchId: string, completion: Promise<HookRunReport>): void {
    this.running.add(completion);
    void completion
      .catch((error: unknown) => {
        this.logger.error(
          `[${dispatchId}] Hook run failed unexpectedly: ${toError(error).message}`,
        );
      })
      .finally(() => this.running.delete(completion));
  }
}
