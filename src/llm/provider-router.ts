import {
  ReasoningProvider,
  ReasoningProviderName,
  CompletionRequest,
  CompletionResponse,
  ProviderRouterConfig,
} from './types';
import { logger } from '../observability/logger';
import { reasoningRequestDuration, reasoningFailovers, reasoningTokens } from '../observability/metrics';
import { ReasoningUnavailableError } from '../orchestrator/errors';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/**
 * Provider Router — tries the primary provider, then the secondary, skipping
 * any whose circuit breaker is open. Exhaustion surfaces as
 * ReasoningUnavailableError.
 */
export class ProviderRouter {
  private providers: Map<ReasoningProviderName, ReasoningProvider>;
  private config: ProviderRouterConfig;
  private circuitBreakers = new Map<ReasoningProviderName, CircuitBreakerState>();
  private log = logger.child({ component: 'provider-router' });

  constructor(config: ProviderRouterConfig, providers: Map<ReasoningProviderName, ReasoningProvider>) {
    this.config = config;
    this.providers = providers;

    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      availableProviders: Array.from(providers.keys()),
    }, 'Provider router initialized');
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const order = this.providerOrder();
    let lastError: Error | undefined;
    let failedProvider: ReasoningProviderName | undefined;

    for (const providerName of order) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const cb = this.circuitBreakers.get(providerName);
      if (cb && Date.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      const timer = reasoningRequestDuration.startTimer({ provider: providerName, model: provider.model });

      try {
        const response = await provider.complete(request);
        this.resetCircuitBreaker(providerName);
        timer({ status: 'success' });

        reasoningTokens.inc({ provider: providerName, token_type: 'prompt' }, response.usage.promptTokens);
        reasoningTokens.inc({ provider: providerName, token_type: 'completion' }, response.usage.completionTokens);

        if (failedProvider) {
          reasoningFailovers.inc({ from_provider: failedProvider, to_provider: providerName });
          this.log.info({ from: failedProvider, to: providerName }, 'Successful failover to secondary provider');
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        this.recordFailure(providerName);
        lastError = err instanceof Error ? err : new Error(String(err));
        failedProvider = providerName;
        this.log.warn({ provider: providerName, err: lastError.message }, 'Provider failed, trying next');
      }
    }

    throw new ReasoningUnavailableError(
      `All reasoning providers failed. Last error: ${lastError?.message ?? 'all circuits open'}`,
      { cause: lastError },
    );
  }

  async healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>> {
    const results: Record<string, { status: string; latencyMs: number }> = {};

    for (const [name, provider] of this.providers) {
      const start = Date.now();
      const healthy = await provider.healthCheck();
      results[name] = { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
    }

    return results;
  }

  private providerOrder(): ReasoningProviderName[] {
    const order: ReasoningProviderName[] = [this.config.primaryProvider];
    if (this.config.secondaryProvider && this.config.secondaryProvider !== this.config.primaryProvider) {
      order.push(this.config.secondaryProvider);
    }
    return order;
  }

  private recordFailure(provider: ReasoningProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = Date.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: ReasoningProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }
}
