/**
 * Outcome of checking an `x-hub-signature` header against a body
 */
export enum SignatureVerdict {
  /**
   * Digest matches the HMAC of the body
   */
  VALID = 'valid',

  /**
   * Header well formed, digest differs
   */
  MISMATCH = 'mismatch',

  /**
   * No `=`, invalid hex, or wrong digest length
   */
  MALFORMED_HEADER = 'malformed_header',

  /**
   * Algorithm token is not one we compute
   */
  UNSUPPORTED_ALGORITHM = 'unsupported_algorithm',
}
