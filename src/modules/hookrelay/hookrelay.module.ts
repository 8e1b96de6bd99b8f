import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  OnModuleInit,
  Provider,
} from '@nestjs/common';
import {
  BodyStreamer,
  HookDispatcher,
  HookRegistry,
  LifecycleSupervisor,
  ProcessLauncher,
} from '../../core';
import {
  BODY_STREAMER,
  HOOKRELAY_CONFIG,
  HOOK_DISPATCHER,
  HOOK_REGISTRY,
  LIFECYCLE_SUPERVISOR,
  PROCESS_LAUNCHER,
} from './constants';
import { DispatchController } from './controllers';
import {
  HookRelayModuleAsyncConfig,
  HookRelayModuleConfig,
  ResolvedHookRelayConfig,
  resolveHookRelayConfig,
} from './hookrelay.config';
import { ConfigurationService } from './services/configuration.service';

/**
 * hookrelay Module
 *
 * Wires the registry, launcher, streamer, supervisor and dispatcher and
 * mounts the catch-all dispatch controller.
 */
@Global()
@Module({})
export class HookRelayModule implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(HookRelayModule.name);

  constructor(
    @Inject(HOOK_REGISTRY)
    private readonly registry: HookRegistry,
    @Inject(HOOK_DISPATCHER)
    private readonly dispatcher: HookDispatcher,
  ) {}

  /**
   * Configure hookrelay synchronously
   */
  static forRoot(config: HookRelayModuleConfig): DynamicModule {
    return {
      module: HookRelayModule,
      providers: [
        {
          provide: HOOKRELAY_CONFIG,
          useValue: resolveHookRelayConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [DispatchController],
      exports: this.exportedTokens(),
    };
  }

  /**
   * Configure hookrelay asynchronously
   */
  static forRootAsync(options: HookRelayModuleAsyncConfig): DynamicModule {
    return {
      module: HookRelayModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: HOOKRELAY_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveHookRelayConfig(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        ...this.createProviders(),
      ],
      controllers: [DispatchController],
      exports: this.exportedTokens(),
    };
  }

  onModuleInit(): void {
    const paths = this.registry.paths();
    this.logger.log(
      `Loaded ${paths.length} hook(s)${paths.length > 0 ? `: ${paths.join(', ')}` : ''}`,
    );
  }

  onApplicationShutdown(signal?: string): void {
    if (signal) {
      this.logger.log(`Received ${signal}, exiting`);
    }
    const active = this.dispatcher.activeRuns;
    if (active > 0) {
      this.logger.warn(`${active} hook(s) still running; leaving them to finish on their own`);
    }
  }

  private static createProviders(): Provider[] {
    return [
      {
        provide: HOOK_REGISTRY,
        useFactory: (config: ResolvedHookRelayConfig) =>
          HookRegistry.fromDefinitions(config.hooks),
        inject: [HOOKRELAY_CONFIG],
      },
      {
        provide: PROCESS_LAUNCHER,
        useFactory: () => new ProcessLauncher(),
      },
      {
        provide: BODY_STREAMER,
        useFactory: (config: ResolvedHookRelayConfig) => new BodyStreamer(config.bodyLimit),
        inject: [HOOKRELAY_CONFIG],
      },
      {
        provide: LIFECYCLE_SUPERVISOR,
        useFactory: () => new LifecycleSupervisor(),
      },
      {
        provide: HOOK_DISPATCHER,
        useFactory: (
          config: ResolvedHookRelayConfig,
          registry: HookRegistry,
          launcher: ProcessLauncher,
          streamer: BodyStreamer,
          supervisor: LifecycleSupervisor,
        ) =>
          new HookDispatcher({
            registry,
            launcher,
            streamer,
            supervisor,
            timeoutSeconds: config.timeout,
          }),
        inject: [
          HOOKRELAY_CONFIG,
          HOOK_REGISTRY,
          PROCESS_LAUNCHER,
          BODY_STREAMER,
          LIFECYCLE_SUPERVISOR,
        ],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
    ];
  }

  private static exportedTokens() {
    return [HOOKRELAY_CONFIG, HOOK_REGISTRY, HOOK_DISPATCHER, ConfigurationService];
  }
}
