import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const stageRuns = new client.Counter({
  name: 'router_stage_runs_total',
  help: 'Stage executions by stage and result',
  labelNames: ['stage', 'result'] as const,
  registers: [registry],
});

export const stageDuration = new client.Histogram({
  name: 'router_stage_duration_seconds',
  help: 'Wall-clock time per stage execution',
  labelNames: ['stage'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const stageRetries = new client.Counter({
  name: 'router_stage_retries_total',
  help: 'Stage re-invocations after a collaborator failure',
  labelNames: ['stage', 'kind'] as const,
  registers: [registry],
});

export const routerDecisions = new client.Counter({
  name: 'router_decisions_total',
  help: 'Router decisions by incoming signal and chosen step',
  labelNames: ['signal', 'next'] as const,
  registers: [registry],
});

export const terminalOutcomes = new client.Counter({
  name: 'router_terminal_outcomes_total',
  help: 'Tickets reaching a terminal status',
  labelNames: ['outcome', 'urgency'] as const,
  registers: [registry],
});

export const runFailures = new client.Counter({
  name: 'router_run_failures_total',
  help: 'Routing runs that ended in a fatal error',
  labelNames: ['code'] as const,
  registers: [registry],
});

export const reasoningRequestDuration = new client.Histogram({
  name: 'reasoning_request_duration_seconds',
  help: 'Reasoning provider latency',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

export const reasoningFailovers = new client.Counter({
  name: 'reasoning_provider_failovers_total',
  help: 'Requests served by a fallback provider',
  labelNames: ['from_provider', 'to_provider'] as const,
  registers: [registry],
});

export const reasoningTokens = new client.Counter({
  name: 'reasoning_tokens_total',
  help: 'Tokens consumed by provider and type',
  labelNames: ['provider', 'token_type'] as const,
  registers: [registry],
});

export const ticketOperations = new client.Counter({
  name: 'ticket_operations_total',
  help: 'Ticket collaborator operations',
  labelNames: ['operation', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
