import { Logger } from '@nestjs/common';
import { BodyDelivery } from '../domain/enums';
import { BodyDeliveryReport } from '../domain/models';
import { HookLogger } from '../interfaces';
import { HookProcessHandle, isBrokenPipe, toError } from '../process';
import { SignatureContext } from '../signature';
import { BodySource } from './types';

/**
 * Default cap on bodies buffered for signature verification (10 MiB)
 */
export const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024;

class BodyLimitExceededError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyLimitExceededError';
  }
}

function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
}

/**
 * Body Streamer
 *
 * Drains a request body into a hook's stdin and closes the pipe.
 *
 * Without a signature, chunks go to the pipe as they arrive, one write in
 * flight at a time. With a signature, the whole body is buffered while the
 * HMAC accumulates and is written only when the digest matches.
 */
export class BodyStreamer {
  constructor(
    private readonly bodyLimit: number = DEFAULT_BODY_LIMIT,
    private readonly logger: HookLogger = new Logger(BodyStreamer.name),
  ) {}

  async stream(
    body: BodySource,
    handle: HookProcessHandle,
    signature?: SignatureContext,
    label = `pid ${handle.pid}`,
  ): Promise<BodyDeliveryReport> {
    let report: BodyDeliveryReport;
    try {
      report = signature
        ? await this.forwardVerified(body, handle, signature, label)
        : await this.forward(body, handle, label);
    } finally {
      // Always closed; a close failure is only logged
      await this.close(handle, label);
    }
    return report;
  }

  private async forward(
    body: BodySource,
    handle: HookProcessHandle,
    label: string,
  ): Promise<BodyDeliveryReport> {
    let bytesForwarded = 0;
    let stopped: BodyDeliveryReport | undefined;

    try {
      for await (const raw of body) {
        if (stopped) {
          // Drained and discarded so the request stream stays intact
          continue;
        }
        const chunk = toBuffer(raw);
        stopped = await this.write(handle, chunk, bytesForwarded, label);
        if (stopped) {
          await this.close(handle, label);
        } else {
          bytesForwarded += chunk.length;
        }
      }
    } catch (error) {
      if (stopped) {
        this.logger.debug(
          `Request body for hook ${label} failed while draining: ${toError(error).message}`,
        );
        return stopped;
      }
      return this.readFailed(toError(error), bytesForwarded, label);
    }

    return stopped ?? { delivery: BodyDelivery.DELIVERED, bytesForwarded };
  }

  private async forwardVerified(
    body: BodySource,
    handle: HookProcessHandle,
    signature: SignatureContext,
    label: string,
  ): Promise<BodyDeliveryReport> {
    const chunks: Buffer[] = [];
    let size = 0;

    try {
      for await (const raw of body) {
        const chunk = toBuffer(raw);
        size += chunk.length;
        if (size > this.bodyLimit) {
          throw new BodyLimitExceededError(this.bodyLimit);
        }
        signature.update(chunk);
        chunks.push(chunk);
      }
    } catch (error) {
      if (error instanceof BodyLimitExceededError) {
        this.logger.warn(`${error.message} for hook ${label}; nothing forwarded`);
        return { delivery: BodyDelivery.BODY_TOO_LARGE, bytesForwarded: 0, error };
      }
      return this.readFailed(toError(error), 0, label);
    }

    if (!signature.matches()) {
      this.logger.warn(`Signature mismatch for hook ${label}; closing its input`);
      return { delivery: BodyDelivery.SIGNATURE_MISMATCH, bytesForwarded: 0 };
    }

    const payload = Buffer.concat(chunks, size);
    const written = await this.write(handle, payload, 0, label);
    if (written) {
      return written;
    }
    return { delivery: BodyDelivery.DELIVERED, bytesForwarded: payload.length };
  }

  /**
   * Write one chunk and wait for it to be flushed
   *
   * Returns a report when forwarding has to stop, nothing otherwise.
   */
  private async write(
    handle: HookProcessHandle,
    chunk: Buffer,
    bytesForwarded: number,
    label: string,
  ): Promise<BodyDeliveryReport | undefined> {
    if (chunk.length === 0) {
      return undefined;
    }

    try {
      await new Promise<void>((resolve, reject) => {
        handle.input.write(chunk, (error?: Error | null) =>
          error ? reject(error) : resolve(),
        );
      });
      return undefined;
    } catch (error) {
      if (isBrokenPipe(error)) {
        this.logger.debug(`Hook ${label} closed its input early`);
        return {
          delivery: BodyDelivery.CHILD_CLOSED,
          bytesForwarded,
        };
      }
      const failure = toError(error);
      this.logger.error(`Failed to write to the pipe of hook ${label}: ${failure.message}`);
      return { delivery: BodyDelivery.WRITE_FAILED, bytesForwarded, error: failure };
    }
  }

  private readFailed(
    error: Error,
    bytesForwarded: number,
    label: string,
  ): BodyDeliveryReport {
    this.logger.error(`Failed to read request body for hook ${label}: ${error.message}`);
    return { delivery: BodyDelivery.READ_FAILED, bytesForwarded, error };
  }

  private async close(handle: HookProcessHandle, label: string): Promise<void> {
    try {
      await handle.closeInput();
    } catch (error) {
      this.logger.error(
        `Failed to close the pipe of hook ${label}: ${toError(error).message}`,
      );
    }
  }
}
