/**
 * A hook entry as it appears in configuration
 */
export interface HookDefinition {
  /**
   * Request path the hook is bound to, matched verbatim
   */
  path: string;

  /**
   * Executable name or path
   */
  program: string;

  /**
   * Ordered argument list
   */
  args?: string[];

  /**
   * Shared secret for `x-hub-signature` authentication
   */
  secret?: string;

  /**
   * Per-hook timeout in seconds, overriding the global one (0 = unlimited)
   */
  timeout?: number;
}

/**
 * Immutable, resolved form of a hook held by the registry
 */
export interface HookDescriptor {
  readonly path: string;
  readonly program: string;
  readonly args: readonly string[];
  readonly secret?: Buffer;
  readonly timeoutSeconds?: number;
}

/**
 * Build a frozen descriptor from a configuration entry
 */
export function createHookDescriptor(definition: HookDefinition): HookDescriptor {
  return Object.freeze({
    path: definition.path,
    program: definition.program,
    args: Object.freeze([...(definition.args ?? [])]),
    secret:
      definition.secret !== undefined
        ? Buffer.from(definition.secret, 'utf8')
        : undefined,
    timeoutSeconds: definition.timeout,
  });
}

/**
 * Render the command line of a hook for log output
 */
export function formatHookCommand(hook: Pick<HookDescriptor, 'program' | 'args'>): string {
  return [hook.program, ...hook.args].join(' ');
}
