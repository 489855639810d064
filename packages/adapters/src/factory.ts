import type { ProviderConfig } from '@leansmith/shared';
import type { ProviderAdapter } from './adapter';
import { OpenAIAdapter } from './openai';
import { FakeAdapter } from './fake/adapter';

export function createProviderAdapter(config: ProviderConfig): ProviderAdapter {
  switch (config.type) {
    case 'openai':
      return new OpenAIAdapter(config);
    case 'fake':
      return new FakeAdapter(config);
  }
}
