import {
  REASONING_PROVIDERS,
  ReasoningProvider,
  ReasoningProviderConfig,
  ReasoningProviderName,
} from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { ProviderRouter } from './provider-router';
import { LLMReasoningEngine, ReasoningEngineOptions } from './reasoning-engine';
import { logger } from '../observability/logger';

export type ProviderConfigs = Record<ReasoningProviderName, ReasoningProviderConfig>;

export interface ReasoningSetup {
  engine: LLMReasoningEngine;
  router: ProviderRouter;
}

export function createProvider(name: ReasoningProviderName, config: ReasoningProviderConfig): ReasoningProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
  }
}

/** Providers with an API key; at least one is required */
export function buildProviders(configs: ProviderConfigs): Map<ReasoningProviderName, ReasoningProvider> {
  const providers = new Map<ReasoningProviderName, ReasoningProvider>();

  for (const name of REASONING_PROVIDERS) {
    const config = configs[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
  }

  if (providers.size === 0) {
    throw new Error('No reasoning providers configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY');
  }

  logger.info(
    { providers: Array.from(providers, ([name, p]) => `${name}:${p.model}`) },
    'Reasoning providers initialized',
  );
  return providers;
}

/** Sampling settings come from the primary provider's configuration */
export function engineOptionsFor(primary: ReasoningProviderName, configs: ProviderConfigs): ReasoningEngineOptions {
  const { temperature, maxTokens } = configs[primary];
  return { temperature, maxTokens };
}

/** Parse a provider name from configuration; unknown or empty values give undefined */
export function toProviderName(value: string): ReasoningProviderName | undefined {
  return REASONING_PROVIDERS.find((p) => p === value);
}

/**
 * Providers, failover router and engine from configuration.
 * Falls back to the first configured provider when the primary has no key.
 */
export function createReasoningEngine(
  configs: ProviderConfigs,
  primaryName: string,
  secondaryName: string,
): ReasoningSetup {
  const providers = buildProviders(configs);
  const requested = toProviderName(primaryName) ?? 'openai';
  const [firstAvailable] = providers.keys();
  const primary = providers.has(requested) ? requested : firstAvailable;

  const router = new ProviderRouter(
    { primaryProvider: primary, secondaryProvider: toProviderName(secondaryName) },
    providers,
  );
  const engine = new LLMReasoningEngine(router, engineOptionsFor(primary, configs));
  return { engine, router };
}
