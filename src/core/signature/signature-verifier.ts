import * as crypto from 'crypto';
import { SignatureVerdict } from '../domain/enums';

/**
 * Request header carrying the body signature
 */
export const SIGNATURE_HEADER = 'x-hub-signature';

/**
 * Algorithms accepted in the signature header, keyed by their token
 */
const SIGNATURE_ALGORITHMS = {
  sha1: { hmac: 'sha1', digestLength: 20 },
} as const;

export type SignatureAlgorithm = keyof typeof SIGNATURE_ALGORITHMS;

/**
 * A well-formed signature header with a recognized algorithm
 */
export interface ParsedSignature {
  algorithm: SignatureAlgorithm;
  digest: Buffer;
}

export type SignatureParseResult =
  | { ok: true; signature: ParsedSignature }
  | {
      ok: false;
      verdict:
        | SignatureVerdict.MALFORMED_HEADER
        | SignatureVerdict.UNSUPPORTED_ALGORITHM;
    };

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

function isSignatureAlgorithm(token: string): token is SignatureAlgorithm {
  return Object.prototype.hasOwnProperty.call(SIGNATURE_ALGORITHMS, token);
}

/**
 * Parse `<algorithm>=<hex-digest>`, split at the first `=`
 *
 * The algorithm is checked before the digest, so an unknown token is
 * reported as unsupported even when its digest would not parse.
 */
export function parseSignatureHeader(header: string): SignatureParseResult {
  const separator = header.indexOf('=');
  if (separator === -1) {
    return { ok: false, verdict: SignatureVerdict.MALFORMED_HEADER };
  }

  const token = header.slice(0, separator);
  const hex = header.slice(separator + 1);

  if (!isSignatureAlgorithm(token)) {
    return { ok: false, verdict: SignatureVerdict.UNSUPPORTED_ALGORITHM };
  }

  const { digestLength } = SIGNATURE_ALGORITHMS[token];
  if (hex.length !== digestLength * 2 || !HEX_PATTERN.test(hex)) {
    return { ok: false, verdict: SignatureVerdict.MALFORMED_HEADER };
  }

  return {
    ok: true,
    signature: { algorithm: token, digest: Buffer.from(hex, 'hex') },
  };
}

/**
 * Incremental HMAC over a body, compared against the expected digest
 *
 * One context per request. Feed every body chunk through `update` in
 * order, then call `matches` once.
 */
export class SignatureContext {
  private readonly hmac: crypto.Hmac;
  private compared = false;

  constructor(
    private readonly signature: ParsedSignature,
    secret: Buffer,
  ) {
    this.hmac = crypto.createHmac(
      SIGNATURE_ALGORITHMS[signature.algorithm].hmac,
      secret,
    );
  }

  get algorithm(): SignatureAlgorithm {
    return this.signature.algorithm;
  }

  update(chunk: Buffer): this {
    this.hmac.update(chunk);
    return this;
  }

  /**
   * Finalize the HMAC and compare in constant time
   */
  matches(): boolean {
    if (this.compared) {
      throw new Error('Signature context has already been compared');
    }
    this.compared = true;

    const computed = this.hmac.digest();
    return (
      computed.length === this.signature.digest.length &&
      crypto.timingSafeEqual(computed, this.signature.digest)
    );
  }
}

/**
 * Check a complete body against a signature header in one step
 */
export function verifySignature(
  header: string,
  secret: Buffer,
  body: Buffer,
): SignatureVerdict {
  const parsed = parseSignatureHeader(header);
  if (!parsed.ok) {
    return parsed.verdict;
  }

  const context = new SignatureContext(parsed.signature, secret);
  return context.update(body).matches()
    ? SignatureVerdict.VALID
    : SignatureVerdict.MISMATCH;
}
