/**
 * Injection tokens for the hookrelay module
 */

export const HOOKRELAY_CONFIG = Symbol('HOOKRELAY_CONFIG');
export const HOOK_REGISTRY = Symbol('HOOK_REGISTRY');
export const PROCESS_LAUNCHER = Symbol('PROCESS_LAUNCHER');
export const BODY_STREAMER = Symbol('BODY_STREAMER');
export const LIFECYCLE_SUPERVISOR = Symbol('LIFECYCLE_SUPERVISOR');
export const HOOK_DISPATCHER = Symbol('HOOK_DISPATCHER');
