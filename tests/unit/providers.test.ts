import OpenAI from 'openai';
import { OpenAIChatClient, OpenAIProvider } from '../../src/llm/providers/openai-provider';
import {
  AnthropicMessagesClient,
  AnthropicProvider,
  mergeConsecutiveRoles,
  toMessageParams,
} from '../../src/llm/providers/anthropic-provider';
import {
  ProviderConfigs,
  buildProviders,
  createReasoningEngine,
  engineOptionsFor,
  toProviderName,
} from '../../src/llm/provider-factory';
import { ProviderRouter } from '../../src/llm/provider-router';
import { LLMReasoningEngine } from '../../src/llm/reasoning-engine';
import { CompletionRequest, ReasoningProviderConfig } from '../../src/llm/types';

const config: ReasoningProviderConfig = {
  apiKey: 'test-key',
  model: 'test-model',
  maxTokens: 500,
  temperature: 0.1,
  timeoutMs: 1000,
};

const request: CompletionRequest = {
  messages: [
    { role: 'system', content: 'Classify the ticket.' },
    { role: 'user', content: 'I cannot log in' },
  ],
  temperature: 0.2,
  maxTokens: 1000,
  jsonMode: true,
};

function chatCompletion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: 'cmpl-1',
    object: 'chat.completion',
    created: 1,
    model: 'test-model-0601',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
  };
}

function openAIClient(content: string | null) {
  const create = jest.fn(
    async (_params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion> =>
      chatCompletion(content),
  );
  const list = jest.fn(async (): Promise<unknown> => ({ data: [] }));
  const client: OpenAIChatClient = { chat: { completions: { create } }, models: { list } };
  return { client, create, list };
}

describe('OpenAIProvider', () => {
  it('requests JSON mode and caps max tokens at the configured ceiling', async () => {
    const { client, create } = openAIClient('{"ok":true}');

    await new OpenAIProvider(config, client).complete(request);

    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Classify the ticket.' },
        { role: 'user', content: 'I cannot log in' },
      ],
      temperature: 0.2,
      max_tokens: 500,
      response_format: { type: 'json_object' },
    });
  });

  it('leaves response_format out without JSON mode', async () => {
    const { client, create } = openAIClient('plain');

    await new OpenAIProvider(config, client).complete({ ...request, jsonMode: false, maxTokens: 50 });

    const [params] = create.mock.calls[0];
    expect(params.response_format).toBeUndefined();
    expect(params.max_tokens).toBe(50);
  });

  it('maps content, model and usage from the completion', async () => {
    const { client } = openAIClient('{"ok":true}');

    const response = await new OpenAIProvider(config, client).complete(request);

    expect(response).toMatchObject({
      content: '{"ok":true}',
      model: 'test-model-0601',
      provider: 'openai',
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });
  });

  it('rejects an empty completion', async () => {
    const { client } = openAIClient(null);

    await expect(new OpenAIProvider(config, client).complete(request)).rejects.toThrow(
      'OpenAI returned empty response content',
    );
  });

  it('reports health from the models endpoint', async () => {
    const { client, list } = openAIClient('x');
    const provider = new OpenAIProvider(config, client);

    expect(await provider.healthCheck()).toBe(true);
    list.mockRejectedValueOnce(new Error('401'));
    expect(await provider.healthCheck()).toBe(false);
  });
});

describe('toMessageParams', () => {
  it('moves system text to the system parameter and appends the JSON instruction', () => {
    const params = toMessageParams(
      'test-model',
      {
        messages: [
          { role: 'system', content: 'Guidelines.' },
          { role: 'system', content: 'Context.' },
          { role: 'user', content: 'first' },
          { role: 'user', content: 'second' },
        ],
        temperature: 0,
        maxTokens: 300,
        jsonMode: true,
      },
      1000,
    );

    expect(params).toEqual({
      model: 'test-model',
      max_tokens: 300,
      temperature: 0,
      system:
        'Guidelines.\n\nContext.\n\n' +
        'Respond with a single JSON object only. No markdown fences, no text before or after it.',
      messages: [{ role: 'user', content: 'first\n\nsecond' }],
    });
  });

  it('opens with a user turn and omits an empty system parameter', () => {
    const params = toMessageParams(
      'test-model',
      { messages: [{ role: 'assistant', content: 'hello' }], temperature: 0, maxTokens: 2000, jsonMode: false },
      1000,
    );

    expect(params.system).toBeUndefined();
    expect(params.max_tokens).toBe(1000);
    expect(params.messages).toEqual([
      { role: 'user', content: '(ticket start)' },
      { role: 'assistant', content: 'hello' },
    ]);
  });
});

describe('mergeConsecutiveRoles', () => {
  it('joins runs of the same role and keeps the input intact', () => {
    const input = [
      { role: 'user' as const, content: 'a' },
      { role: 'user' as const, content: 'b' },
      { role: 'assistant' as const, content: 'c' },
    ];

    expect(mergeConsecutiveRoles(input)).toEqual([
      { role: 'user', content: 'a\n\nb' },
      { role: 'assistant', content: 'c' },
    ]);
    expect(input[0].content).toBe('a');
  });
});

describe('AnthropicProvider', () => {
  it('reports an unhealthy API', async () => {
    const client: AnthropicMessagesClient = {
      messages: {
        create: jest.fn(async () => {
          throw new Error('overloaded');
        }),
      },
    };

    expect(await new AnthropicProvider(config, client).healthCheck()).toBe(false);
  });
});

describe('provider factory', () => {
  const configs: ProviderConfigs = {
    openai: { ...config, temperature: 0.3, maxTokens: 700 },
    anthropic: { ...config, apiKey: '', temperature: 0.6, maxTokens: 900 },
  };

  it('builds only providers that have a key', () => {
    expect(Array.from(buildProviders(configs).keys())).toEqual(['openai']);
  });

  it('refuses to start without any key', () => {
    expect(() =>
      buildProviders({ openai: { ...config, apiKey: '' }, anthropic: { ...config, apiKey: '' } }),
    ).toThrow('No reasoning providers configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY');
  });

  it('takes sampling settings from the primary provider', () => {
    expect(engineOptionsFor('openai', configs)).toEqual({ temperature: 0.3, maxTokens: 700 });
    expect(engineOptionsFor('anthropic', configs)).toEqual({ temperature: 0.6, maxTokens: 900 });
  });

  it('falls back to a configured provider when the primary has no key', () => {
    const { engine, router } = createReasoningEngine(configs, 'anthropic', 'openai');

    expect(router).toBeInstanceOf(ProviderRouter);
    expect(engine).toBeInstanceOf(LLMReasoningEngine);
  });

  it('parses provider names', () => {
    expect(toProviderName('anthropic')).toBe('anthropic');
    expect(toProviderName('gemini')).toBeUndefined();
    expect(toProviderName('')).toBeUndefined();
  });
});
