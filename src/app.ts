import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createReasoningEngine } from './llm/provider-factory';
import { ReasoningEngine } from './llm/types';
import { KnowledgeService } from './knowledge/knowledge-service';
import { KnowledgeSearch } from './knowledge/types';
import { JsonCustomerDirectory } from './customers/customer-directory';
import { CustomerDirectory } from './customers/types';
import { createTicketingService } from './ticketing/ticketing-service';
import { TicketingService } from './ticketing/types';
import { createSessionStore } from './session/session-store';
import { SessionStore } from './session/types';
import { PromptManager } from './stages/prompt-manager';
import { createStages } from './stages';
import { OrchestratorOptions, TicketOrchestrator } from './orchestrator/orchestrator';
import { registerTicketRoutes } from './channels/ticket-routes';
import { ReasoningHealth, registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  orchestrator: TicketOrchestrator;
  store: SessionStore;
  tickets: TicketingService;
}

/** Collaborators a caller (usually a test) may supply instead of the defaults */
export interface AppOverrides {
  engine?: ReasoningEngine;
  knowledge?: KnowledgeSearch;
  customers?: CustomerDirectory;
  tickets?: TicketingService;
  store?: SessionStore;
  prompts?: PromptManager;
  orchestrator?: OrchestratorOptions;
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // ───── Session store ─────
  let redis: Redis | undefined;
  if (!overrides.store && env.redis.url) {
    redis = await connectRedis(env.redis.url);
  }
  const store = overrides.store ?? createSessionStore(redis);

  // ───── Reasoning engine ─────
  let engine = overrides.engine;
  let reasoningHealth: ReasoningHealth | undefined;
  if (!engine) {
    const reasoning = createReasoningEngine(
      { openai: env.openai, anthropic: env.anthropic },
      env.llm.primaryProvider,
      env.llm.secondaryProvider,
    );
    engine = reasoning.engine;
    reasoningHealth = reasoning.router;
  }

  // ───── Collaborators & stages ─────
  const tickets = overrides.tickets ?? createTicketingService();
  const stages = createStages({
    engine,
    knowledge: overrides.knowledge ?? new KnowledgeService(),
    customers: overrides.customers ?? JsonCustomerDirectory.fromFile(),
    tickets,
    prompts: overrides.prompts ?? new PromptManager(),
  });
  const orchestrator = new TicketOrchestrator(store, tickets, stages, overrides.orchestrator);

  // ───── Routes ─────
  registerHealthRoutes(app, redis, reasoningHealth);
  registerTicketRoutes(app, orchestrator, store);

  logger.info({
    store: redis ? 'redis' : 'memory',
    thresholds: { high: env.router.highUrgencyThreshold, standard: env.router.standardThreshold },
    maxTransitions: env.router.maxTransitions,
  }, 'Support ticket router initialized');

  return { app, redis, orchestrator, store, tickets };
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}
