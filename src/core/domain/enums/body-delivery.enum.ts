/**
 * How the transfer of a request body into a hook's stdin ended
 */
export enum BodyDelivery {
  /**
   * Every byte was written and the pipe closed
   */
  DELIVERED = 'delivered',

  /**
   * The child closed its end first; remaining bytes were dropped
   */
  CHILD_CLOSED = 'child_closed',

  /**
   * Signature did not match; nothing was written
   */
  SIGNATURE_MISMATCH = 'signature_mismatch',

  /**
   * Buffered body exceeded the configured limit; nothing was written
   */
  BODY_TOO_LARGE = 'body_too_large',

  /**
   * Reading the request body failed
   */
  READ_FAILED = 'read_failed',

  /**
   * Writing to the pipe failed for a reason other than a closed reader
   */
  WRITE_FAILED = 'write_failed',
}
