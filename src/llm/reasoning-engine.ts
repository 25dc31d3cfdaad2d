import { CompletionRequest, CompletionResponse, InferenceRequest, InferenceResult, ReasoningEngine, ReasoningMessage } from './types';
import { logger } from '../observability/logger';
import { asCollaboratorFailure } from '../orchestrator/errors';

/** Anything that can serve a completion; ProviderRouter in production */
export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface ReasoningEngineOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Reasoning engine backed by the provider router.
 *
 * Prompt layout, identical across providers:
 *   system:  stage instructions + response format
 *   system:  ticket context
 *   user:    the customer's message
 */
export class LLMReasoningEngine implements ReasoningEngine {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly backend: CompletionBackend,
    options: ReasoningEngineOptions = {},
  ) {
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens ?? 1024;
  }

  async infer(request: InferenceRequest): Promise<InferenceResult> {
    const log = logger.child({ component: 'reasoning-engine', stage: request.stage, sessionId: request.sessionId });
    const completionRequest: CompletionRequest = {
      messages: buildMessages(request),
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      jsonMode: request.responseSchema !== undefined,
    };

    try {
      const completion = await this.backend.complete(completionRequest);
      log.debug({
        provider: completion.provider,
        model: completion.model,
        latencyMs: completion.latencyMs,
        tokens: completion.usage.totalTokens,
      }, 'Inference complete');
      return { content: completion.content, provider: completion.provider, model: completion.model };
    } catch (err) {
      log.error({ err }, 'Inference failed');
      throw asCollaboratorFailure('reasoning', err);
    }
  }
}

export function buildMessages(request: InferenceRequest): ReasoningMessage[] {
  const instructions = [request.instructions.trim()];
  if (request.responseSchema) {
    instructions.push(
      '',
      '--- RESPONSE FORMAT ---',
      'You MUST respond with a JSON object matching this schema:',
      JSON.stringify(request.responseSchema, null, 2),
    );
  }

  return [
    { role: 'system', content: instructions.join('\n') },
    { role: 'system', content: `--- TICKET CONTEXT ---\n${request.context}` },
    { role: 'user', content: request.customerMessage },
  ];
}
