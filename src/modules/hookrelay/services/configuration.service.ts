import { Inject, Injectable } from '@nestjs/common';
import { ListenConfig } from '../../../adapters';
import { HOOKRELAY_CONFIG } from '../constants';
import type { ResolvedHookRelayConfig } from '../hookrelay.config';

/**
 * Configuration Service
 *
 * Read access to the resolved hookrelay configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(HOOKRELAY_CONFIG)
    private readonly config: ResolvedHookRelayConfig,
  ) {}

  getListenConfig(): ListenConfig {
    return { bind: this.config.bind, socket: this.config.socket };
  }

  isDocsEnabled(): boolean {
    return this.config.docs.enabled;
  }

  getDocsPath(): string {
    return this.config.docs.path;
  }
}
