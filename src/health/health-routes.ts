import { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';

/** Anything that can report per-provider reasoning health */
export interface ReasoningHealth {
  healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>>;
}

/** The Redis call readiness needs */
export interface Pingable {
  ping(): Promise<string>;
}

export type CheckStatus = 'ok' | 'error' | 'skipped';

export interface Readiness {
  ready: boolean;
  checks: Record<string, { status: string; latencyMs?: number }>;
}

async function pingCheck(redis: Pingable): Promise<{ status: CheckStatus; latencyMs: number }> {
  const start = Date.now();
  try {
    await redis.ping();
    return { status: 'ok', latencyMs: Date.now() - start };
  } catch {
    return { status: 'error', latencyMs: Date.now() - start };
  }
}

/**
 * Readiness across the session store and every configured reasoning
 * provider. A missing dependency is `skipped`, not a failure.
 */
export async function collectReadiness(redis?: Pingable, reasoning?: ReasoningHealth): Promise<Readiness> {
  const checks: Readiness['checks'] = {
    redis: redis ? await pingCheck(redis) : { status: 'skipped' },
  };

  if (!reasoning) {
    checks.llm = { status: 'skipped' };
  } else {
    try {
      for (const [providerName, check] of Object.entries(await reasoning.healthCheck())) {
        checks[`llm_${providerName}`] = check;
      }
    } catch {
      checks.llm = { status: 'error' };
    }
  }

  const ready = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
  return { ready, checks };
}

export function registerHealthRoutes(app: FastifyInstance, redis?: Pingable, reasoning?: ReasoningHealth): void {
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', async (_req, reply) => {
    const { ready, checks } = await collectReadiness(redis, reasoning);
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
