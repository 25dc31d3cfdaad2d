import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  sessionId?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<TraceContext>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    sessionId: overrides?.sessionId,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Names of the spans recorded so far, in start order */
export function spanNames(ctx: TraceContext): string[] {
  return ctx.spans.map((s) => s.name);
}
