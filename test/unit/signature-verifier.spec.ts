import * as crypto from 'crypto';
import {
  SignatureContext,
  SignatureVerdict,
  parseSignatureHeader,
  verifySignature,
} from '../../src';

describe('Signature verification', () => {
  const secret = Buffer.from('test-secret');
  const body = Buffer.from('{"ref":"refs/heads/main"}');
  const digest = crypto.createHmac('sha1', secret).update(body).digest('hex');

  describe('parseSignatureHeader', () => {
    it('should parse a sha1 header', () => {
      const result = parseSignatureHeader(`sha1=${digest}`);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.signature.algorithm).toBe('sha1');
        expect(result.signature.digest.toString('hex')).toBe(digest);
      }
    });

    it('should accept upper-case hex', () => {
      const result = parseSignatureHeader(`sha1=${digest.toUpperCase()}`);

      expect(result.ok).toBe(true);
    });

    it('should reject a header without "="', () => {
      expect(parseSignatureHeader('sha1')).toEqual({
        ok: false,
        verdict: SignatureVerdict.MALFORMED_HEADER,
      });
    });

    it('should reject invalid hex', () => {
      expect(parseSignatureHeader(`sha1=${'zz'.repeat(20)}`)).toEqual({
        ok: false,
        verdict: SignatureVerdict.MALFORMED_HEADER,
      });
    });

    it('should reject a digest of the wrong length', () => {
      expect(parseSignatureHeader(`sha1=${digest.slice(0, 38)}`)).toEqual({
        ok: false,
        verdict: SignatureVerdict.MALFORMED_HEADER,
      });
      expect(parseSignatureHeader(`sha1=${digest}00`)).toEqual({
        ok: false,
        verdict: SignatureVerdict.MALFORMED_HEADER,
      });
    });

    it('should report an unknown algorithm as unsupported', () => {
      expect(parseSignatureHeader(`sha256=${'ab'.repeat(32)}`)).toEqual({
        ok: false,
        verdict: SignatureVerdict.UNSUPPORTED_ALGORITHM,
      });
    });

    it('should check the algorithm before the digest', () => {
      expect(parseSignatureHeader('md5=not-hex')).toEqual({
        ok: false,
        verdict: SignatureVerdict.UNSUPPORTED_ALGORITHM,
      });
    });

    it('should split at the first "="', () => {
      expect(parseSignatureHeader(`sha1=${digest.slice(0, 39)}=`)).toEqual({
        ok: false,
        verdict: SignatureVerdict.MALFORMED_HEADER,
      });
    });

    it('should not treat inherited object keys as algorithms', () => {
      expect(parseSignatureHeader('constructor=00')).toEqual({
        ok: false,
        verdict: SignatureVerdict.UNSUPPORTED_ALGORITHM,
      });
    });
  });

  describe('verifySignature', () => {
    it('should accept the HMAC of the body', () => {
      expect(verifySignature(`sha1=${digest}`, secret, body)).toBe(SignatureVerdict.VALID);
    });

    it('should report a different body as a mismatch', () => {
      expect(verifySignature(`sha1=${digest}`, secret, Buffer.from('{}'))).toBe(
        SignatureVerdict.MISMATCH,
      );
    });

    it('should report a different secret as a mismatch', () => {
      expect(verifySignature(`sha1=${digest}`, Buffer.from('other-secret'), body)).toBe(
        SignatureVerdict.MISMATCH,
      );
    });

    it('should verify an empty body', () => {
      const empty = crypto.createHmac('sha1', secret).update('').digest('hex');

      expect(verifySignature(`sha1=${empty}`, secret, Buffer.alloc(0))).toBe(
        SignatureVerdict.VALID,
      );
    });

    it('should pass through header verdicts', () => {
      expect(verifySignature('garbage', secret, body)).toBe(SignatureVerdict.MALFORMED_HEADER);
      expect(verifySignature('sha512=00', secret, body)).toBe(
        SignatureVerdict.UNSUPPORTED_ALGORITHM,
      );
    });
  });

  describe('SignatureContext', () => {
    it('should give the same result for a body fed in chunks', () => {
      const parsed = parseSignatureHeader(`sha1=${digest}`);
      if (!parsed.ok) {
        throw new Error('expected a parsed signature');
      }

      const context = new SignatureContext(parsed.signature, secret);
      context.update(body.subarray(0, 5)).update(body.subarray(5, 6)).update(body.subarray(6));

      expect(context.algorithm).toBe('sha1');
      expect(context.matches()).toBe(true);
    });

    it('should refuse a second comparison', () => {
      const parsed = parseSignatureHeader(`sha1=${digest}`);
      if (!parsed.ok) {
        throw new Error('expected a parsed signature');
      }

      const context = new SignatureContext(parsed.signature, secret);
      context.update(body).matches();

      expect(() => context.matches()).toThrow('Signature context has already been compared');
    });
  });
});
