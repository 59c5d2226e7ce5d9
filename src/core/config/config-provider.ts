import type { StructuredLogger } from '../kernel/contracts.js';
import { loadRuntimeConfig } from './runtime-config.js';
import type { ConfigEnvironment, RuntimeFlags, TetherConfig } from './runtime-config.js';

export type ConfigLoader = () => Promise<TetherConfig>;

/**
 * Holds the current configuration snapshot. Consumers read `current()` once
 * per unit of work, so a reload never changes settings mid-run.
 */
export class ConfigProvider {
  private snapshot: TetherConfig;
  private readonly listeners = new Set<(config: TetherConfig) => void>();

  constructor(
    initial: TetherConfig,
    private readonly loader: ConfigLoader,
    private readonly logger?: StructuredLogger
  ) {
    this.snapshot = initial;
  }

  static async load(flags: RuntimeFlags, env: ConfigEnvironment = {}): Promise<ConfigProvider> {
    const loader: ConfigLoader = () => loadRuntimeConfig(flags, env);
    return new ConfigProvider(await loader(), loader, env.logger);
  }

  current(): TetherConfig {
    return this.snapshot;
  }

  /**
   * Re-reads every layer. On failure the previous snapshot stays in place
   * and the error propagates.
   */
  async reload(): Promise<TetherConfig> {
    const next = await this.loader();
    this.snapshot = next;
    this.logger?.info('Configuration reloaded');
    for (const listener of this.listeners) {
      listener(next);
    }
    return next;
  }

  onChange(listener: (config: TetherConfig) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
