import Anthropic from '@anthropic-ai/sdk';
import {
  ReasoningProvider,
  ReasoningProviderConfig,
  ReasoningMessage,
  CompletionRequest,
  CompletionResponse,
} from '../types';
import { logger } from '../../observability/logger';

const JSON_INSTRUCTION = 'Respond with a single JSON object only. No markdown fences, no text before or after it.';
const OPENING_TURN = '(ticket start)';

type MessageParams = Anthropic.MessageCreateParamsNonStreaming;

/** The slice of the Anthropic SDK this adapter calls */
export interface AnthropicMessagesClient {
  messages: {
    create(params: MessageParams): Promise<Anthropic.Message>;
  };
}

/**
 * Anthropic provider adapter.
 *
 * The Messages API takes system text as a separate parameter and wants
 * alternating user/assistant turns that open with the user. JSON mode is an
 * instruction appended to the system text.
 */
export class AnthropicProvider implements ReasoningProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(
    private readonly config: ReasoningProviderConfig,
    private readonly client: AnthropicMessagesClient = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
    }),
  ) {
    this.model = config.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = Date.now();
    const response = await this.client.messages.create(
      toMessageParams(this.model, request, this.config.maxTokens),
    );

    const text = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : []))[0];
    if (text === undefined) {
      throw new Error('Anthropic returned no text content');
    }

    const { input_tokens: promptTokens, output_tokens: completionTokens } = response.usage;
    return {
      content: text,
      model: response.model || this.model,
      provider: 'anthropic',
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}

/** Request mapping; `maxTokensCap` is the configured ceiling for this provider */
export function toMessageParams(model: string, request: CompletionRequest, maxTokensCap: number): MessageParams {
  const systemParts = request.messages.filter((m) => m.role === 'system').map((m) => m.content);
  if (request.jsonMode) systemParts.push(JSON_INSTRUCTION);

  const turns = mergeConsecutiveRoles(request.messages.filter((m) => m.role !== 'system'));
  const messages = turns.map((m): Anthropic.MessageParam => ({
    role: m.role === 'assistant' ? 'assistant' : 'user',
    content: m.content,
  }));
  if (messages[0]?.role !== 'user') {
    messages.unshift({ role: 'user', content: OPENING_TURN });
  }

  const params: MessageParams = {
    model,
    max_tokens: Math.min(request.maxTokens, maxTokensCap),
    temperature: request.temperature,
    messages,
  };
  if (systemParts.length) params.system = systemParts.join('\n\n');
  return params;
}

/** Merge consecutive same-role messages; the Messages API requires alternation. */
export function mergeConsecutiveRoles(messages: ReasoningMessage[]): ReasoningMessage[] {
  const merged: ReasoningMessage[] = [];
  for (const curr of messages) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === curr.role) {
      prev.content += '\n\n' + curr.content;
    } else {
      merged.push({ ...curr });
    }
  }
  return merged;
}
