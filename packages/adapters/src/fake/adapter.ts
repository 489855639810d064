import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@leansmith/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { executeProviderRequest } from '../common';

const CANNED_PLAN = {
  strategy: 'Follow the structure of the template and keep the definition direct.',
  implementation_steps: ['Write the function body with the arguments from the template.'],
  proof_approach: 'Unfold the definition and close the goal with a decision procedure.',
};

const CANNED_SOLUTION = { code: 'a + b', proof: 'rfl', explanation: 'Offline placeholder answer.' };

const CANNED_REVIEW = {
  error_analysis: 'No analysis is available from the offline provider.',
  suggested_fixes: [],
  confidence: 0,
};

/**
 * Offline provider. Replies with the configured `responses` in order and
 * then with a canned answer picked from the system prompt.
 */
export class FakeAdapter implements ProviderAdapter {
  private readonly script: string[];
  /** Every request seen, in order. */
  readonly requests: ModelRequest[] = [];

  constructor(private readonly config: ProviderConfig) {
    this.script = [...(config.responses ?? [])];
  }

  id(): string {
    return `fake:${this.config.model}`;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
    };
  }

  async generate(request: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'fake', this.config.model, async () => {
      this.requests.push(request);
      const scripted = this.script.shift();
      if (scripted !== undefined) {
        return { text: scripted };
      }
      return { text: JSON.stringify(cannedReply(request)) };
    });
  }
}

function cannedReply(request: ModelRequest): object {
  const system = request.messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content.toLowerCase())
    .join('\n');
  if (system.includes('planning')) return CANNED_PLAN;
  if (system.includes('debugging')) return CANNED_REVIEW;
  return CANNED_SOLUTION;
}
