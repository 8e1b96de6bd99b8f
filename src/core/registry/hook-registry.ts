import { Logger } from '@nestjs/common';
import {
  HookDefinition,
  HookDescriptor,
  createHookDescriptor,
} from '../domain/models';
import { HookLogger } from '../interfaces';

/**
 * Hook Registry
 *
 * Immutable mapping from request path to hook descriptor. Built once at
 * startup and only read afterwards, so concurrent dispatches share it
 * without coordination.
 *
 * Paths match verbatim: no prefix or wildcard matching and no
 * trailing-slash normalization. When two definitions share a path the
 * last one wins.
 */
export class HookRegistry {
  private readonly hooks: ReadonlyMap<string, HookDescriptor>;

  private constructor(hooks: Map<string, HookDescriptor>) {
    this.hooks = hooks;
    Object.freeze(this);
  }

  /**
   * Build a registry from configuration entries
   */
  static fromDefinitions(
    definitions: Iterable<HookDefinition>,
    logger: HookLogger = new Logger(HookRegistry.name),
  ): HookRegistry {
    const hooks = new Map<string, HookDescriptor>();

    for (const definition of definitions) {
      if (hooks.has(definition.path)) {
        logger.warn(
          `Hook path ${definition.path} is defined more than once; the last definition wins`,
        );
      }
      hooks.set(definition.path, createHookDescriptor(definition));
    }

    return new HookRegistry(hooks);
  }

  lookup(path: string): HookDescriptor | undefined {
    return this.hooks.get(path);
  }

  get size(): number {
    return this.hooks.size;
  }

  paths(): string[] {
    return [...this.hooks.keys()];
  }
}
