import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@leansmith/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';
import { ConfigError } from '../errors';

export const DEFAULT_OPENAI_KEY_ENV = 'OPENAI_API_KEY';

/**
 * Resolves the API key from `api_key`, then from the configured (or default)
 * environment variable.
 */
export function resolveOpenAIKey(config: Pick<ProviderConfig, 'api_key' | 'api_key_env'>): string {
  const envName = config.api_key_env ?? DEFAULT_OPENAI_KEY_ENV;
  const apiKey = config.api_key || process.env[envName];
  if (!apiKey) {
    throw new ConfigError(
      `Missing API key for OpenAI provider. Checked config.api_key and env var ${envName}`,
    );
  }
  return apiKey;
}

export const openAIErrorConfig: ErrorTypeConfig = {
  isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
  isTimeoutError: (error: unknown): boolean => error instanceof APIConnectionTimeoutError,
};

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig = openAIErrorConfig;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: ProviderConfig) {
    super();
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: resolveOpenAIKey(config),
      baseURL: config.baseURL,
      // Retries belong to executeProviderRequest.
      maxRetries: 0,
    });
  }

  id(): string {
    return `openai:${this.model}`;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'openai', this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: req.messages.map(toOpenAIMessage),
            max_tokens: req.maxTokens,
            temperature: req.temperature ?? 0.2,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        return { text: completion.choices[0]?.message.content ?? undefined };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
