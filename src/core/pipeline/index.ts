/**
 * Dispatch pipeline
 *
 * request → registry lookup → header decision → spawn → body transfer
 * (buffered and verified when the hook has a secret) → pipe close,
 * with the process supervised against its timeout from spawn onwards.
 */

export { HookDispatcher, DEFAULT_TIMEOUT_SECONDS } from './hook-dispatcher';
export { BodyStreamer, DEFAULT_BODY_LIMIT } from './body-streamer';
export * from './types';
