/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Prove that a + b = b + a' }],
 *   maxTokens: 2000,
 *   temperature: 0.1
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
}

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether requests may ask for a JSON-only response */
  supportsJsonMode: boolean;
}
