/**
 * Synchronous outcome of a dispatch, as seen by the client
 */
export enum DispatchStatus {
  /**
   * Hook launched; body transfer and supervision continue in the background
   */
  ACCEPTED = 'accepted',

  /**
   * No hook is bound to the request path
   */
  NOT_FOUND = 'not_found',

  /**
   * Hook requires a signature and none was sent
   */
  UNAUTHORIZED = 'unauthorized',

  /**
   * Signature header could not be parsed
   */
  MALFORMED_SIGNATURE = 'malformed_signature',

  /**
   * Signature header names an algorithm we do not support
   */
  UNSUPPORTED_ALGORITHM = 'unsupported_algorithm',

  /**
   * Program could not be started
   */
  LAUNCH_FAILED = 'launch_failed',
}
