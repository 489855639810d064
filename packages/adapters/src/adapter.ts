import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@leansmith/shared';
import type { AdapterContext } from './types';

/**
 * A generative text service behind a single request/response call.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsJsonMode: false }; }
 *   async generate(req, ctx) { return { text: '{"code":"a + b","proof":"rfl"}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  id(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate one response. Implementations retry transient failures
   * through `executeProviderRequest` and throw once retries are spent.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
