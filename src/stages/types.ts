import pino from 'pino';
import { StageName } from '../config/types';
import { RoutingSignal } from '../routing/types';
import { SessionStore, TicketSession } from '../session/types';
import { TraceContext } from '../observability/trace';

/** Everything a stage gets for one invocation */
export interface StageContext {
  /** Session as last committed */
  session: TicketSession;
  /** The customer message that started this run */
  message: string;
  store: SessionStore;
  log: pino.Logger;
  trace: TraceContext;
}

export interface StageResult {
  /** Session after this stage's commit */
  session: TicketSession;
  signal: RoutingSignal;
}

/**
 * A processing stage. Implementations commit every mutation through the
 * store before returning, never call another stage, and may be re-invoked
 * on the same session and message.
 */
export interface Stage {
  readonly name: StageName;
  run(ctx: StageContext): Promise<StageResult>;
}

export type StageSet = Record<StageName, Stage>;
