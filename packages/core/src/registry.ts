import { ConfigError, type Config, type ProviderConfig, type ProviderRole } from '@leansmith/shared';
import { createProviderAdapter, type ProviderAdapter } from '@leansmith/adapters';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

/**
 * Creates provider adapters from configuration and caches them by provider id.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config);
 * const planner = registry.forRole('planner');
 * const response = await planner.generate(request, ctx);
 * ```
 */
export class ProviderRegistry {
  private adapters = new Map<string, ProviderAdapter>();

  constructor(
    private readonly config: Config,
    private readonly factory: AdapterFactory = createProviderAdapter,
  ) {}

  /**
   * Adapter for a configured provider id, created on first use.
   * @throws {ConfigError} If no provider has that id
   */
  getAdapter(providerId: string): ProviderAdapter {
    const cached = this.adapters.get(providerId);
    if (cached) {
      return cached;
    }

    const providerConfig = this.config.providers[providerId];
    if (!providerConfig) {
      const known = Object.keys(this.config.providers).join(', ') || '(none)';
      throw new ConfigError(`Provider '${providerId}' not found. Configured providers: ${known}`);
    }

    const adapter = this.factory(providerConfig);
    this.adapters.set(providerId, adapter);
    return adapter;
  }

  /** Adapter named by `defaults.<role>`. */
  forRole(role: ProviderRole): ProviderAdapter {
    return this.getAdapter(this.config.defaults[role]);
  }
}
