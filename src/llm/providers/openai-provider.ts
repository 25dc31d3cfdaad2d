import OpenAI from 'openai';
import {
  ReasoningProvider,
  ReasoningProviderConfig,
  CompletionRequest,
  CompletionResponse,
} from '../types';
import { logger } from '../../observability/logger';

// SDK-level retries; stage-level retries live in the orchestrator
const MAX_RETRIES = 1;

type ChatParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

/** The slice of the OpenAI SDK this adapter calls */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: ChatParams): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
  models: {
    list(): Promise<unknown>;
  };
}

/**
 * OpenAI provider adapter.
 *
 * JSON mode is `response_format: { type: 'json_object' }`. Stage schemas
 * travel in the prompt, so both providers see the same instructions.
 */
export class OpenAIProvider implements ReasoningProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private log = logger.child({ component: 'openai-provider' });

  constructor(
    private readonly config: ReasoningProviderConfig,
    private readonly client: OpenAIChatClient = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: MAX_RETRIES,
    }),
  ) {
    this.model = config.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = Date.now();
    const completion = await this.client.chat.completions.create(
      toChatParams(this.model, request, this.config.maxTokens),
    );
    return fromChatCompletion(completion, this.model, Date.now() - start);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (err) {
      this.log.warn({ err }, 'OpenAI health check failed');
      return false;
    }
  }
}

/** Request mapping; `maxTokensCap` is the configured ceiling for this provider */
export function toChatParams(model: string, request: CompletionRequest, maxTokensCap: number): ChatParams {
  const params: ChatParams = {
    model,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    temperature: request.temperature,
    max_tokens: Math.min(request.maxTokens, maxTokensCap),
  };
  if (request.jsonMode) params.response_format = { type: 'json_object' };
  return params;
}

export function fromChatCompletion(
  completion: OpenAI.Chat.ChatCompletion,
  fallbackModel: string,
  latencyMs: number,
): CompletionResponse {
  const content = completion.choices[0]?.message?.content;
  if (!content) {
    throw new Error('OpenAI returned empty response content');
  }

  const usage = completion.usage;
  return {
    content,
    model: completion.model || fallbackModel,
    provider: 'openai',
    usage: {
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      totalTokens: usage?.total_tokens ?? 0,
    },
    latencyMs,
  };
}
