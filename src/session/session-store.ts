import Redis from 'ioredis';
import { ConversationMessage, PreferredChannel } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { CollaboratorFailureError, RoutingError, SessionNotFoundError } from '../orchestrator/errors';
import { ConnectionPool } from './connection-pool';
import { applyMutation, mergePreferences } from './mutation';
import {
  PreferenceFields,
  PreferenceRecord,
  SessionMutation,
  SessionStore,
  TicketSession,
} from './types';

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_COMMIT_ATTEMPTS = 5;
const PREFERRED_CHANNELS: readonly PreferredChannel[] = ['chat', 'email', 'phone', 'sms'];

/**
 * Redis-backed session store.
 *
 * Sessions are JSON documents with no TTL (terminal sessions are kept for
 * audit and customer history). Commits use WATCH/MULTI on a pooled
 * connection so that a concurrent writer forces a re-read instead of a lost
 * update. Preferences live in a hash so each field is last-write-wins.
 */
export class RedisSessionStore implements SessionStore {
  private redis: Redis;
  private prefix: string;
  // WATCH state is per connection, so commits run on pooled duplicates of the shared client
  private transactions: ConnectionPool<Redis>;
  private log = logger.child({ component: 'redis-session-store' });

  constructor(redis: Redis, prefix: string = env.redis.keyPrefix) {
    this.redis = redis;
    this.prefix = prefix;
    this.transactions = new ConnectionPool(
      () => redis.duplicate(),
      (conn) => conn.disconnect(),
    );
  }

  private sessionKey(sessionId: string): string {
    return `${this.prefix}session:${sessionId}`;
  }

  private userSessionsKey(userId: string): string {
    return `${this.prefix}user:${userId}:sessions`;
  }

  private preferencesKey(userId: string): string {
    return `${this.prefix}prefs:${userId}`;
  }

  async load(sessionId: string): Promise<TicketSession | null> {
    return this.guard('load', { sessionId }, async () => {
      const raw = await this.redis.get(this.sessionKey(sessionId));
      return raw ? parseSession(raw) : null;
    });
  }

  async create(session: TicketSession): Promise<TicketSession> {
    return this.guard('create', { sessionId: session.sessionId }, async () => {
      const created = await this.redis.set(this.sessionKey(session.sessionId), JSON.stringify(session), 'NX');
      if (created !== 'OK') {
        const raw = await this.redis.get(this.sessionKey(session.sessionId));
        if (!raw) throw new SessionNotFoundError(session.sessionId);
        return parseSession(raw);
      }
      if (session.externalUserId) {
        await this.redis.zadd(this.userSessionsKey(session.externalUserId), session.createdAt, session.sessionId);
      }
      return session;
    });
  }

  async commit(sessionId: string, mutation: SessionMutation): Promise<TicketSession> {
    const key = this.sessionKey(sessionId);

    try {
      return await this.transactions.use(async (tx) => {
        for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
          await tx.watch(key);
          const raw = await tx.get(key);
          if (!raw) {
            await tx.unwatch();
            throw new SessionNotFoundError(sessionId);
          }

          const current = parseSession(raw);
          const next = applyMutation(current, mutation);

          const multi = tx.multi().set(key, JSON.stringify(next));
          if (next.externalUserId && next.externalUserId !== current.externalUserId) {
            multi.zadd(this.userSessionsKey(next.externalUserId), next.createdAt, sessionId);
          }
          const result = await multi.exec();
          if (result) return next;

          this.log.debug({ sessionId, attempt }, 'Session changed during commit; retrying');
        }
        throw new CollaboratorFailureError(
          'store',
          `commit for session ${sessionId} lost ${MAX_COMMIT_ATTEMPTS} optimistic races`,
        );
      });
    } catch (err) {
      if (err instanceof RoutingError) throw err;
      this.log.error({ err, sessionId }, 'Failed to commit session to Redis');
      throw new CollaboratorFailureError('store', `commit failed for session ${sessionId}`, { cause: err });
    }
  }

  /** Close the pooled transaction connections; the shared client is left to its owner */
  close(): void {
    this.transactions.drain();
  }

  async appendMessage(sessionId: string, message: ConversationMessage): Promise<TicketSession> {
    return this.commit(sessionId, { append: [message] });
  }

  async getPreferences(userId: string): Promise<PreferenceRecord> {
    const hash = await this.guard('getPreferences', { userId }, () => this.redis.hgetall(this.preferencesKey(userId)));
    const record: PreferenceRecord = { userId };
    if (hash.language) record.language = hash.language;
    const channel = PREFERRED_CHANNELS.find((c) => c === hash.channel);
    if (channel) record.channel = channel;
    if (hash.notes) record.notes = hash.notes;
    if (hash.updatedAt) record.updatedAt = Number(hash.updatedAt);
    return record;
  }

  async putPreferences(userId: string, fields: PreferenceFields): Promise<PreferenceRecord> {
    const now = Date.now();
    const values: Record<string, string> = { updatedAt: String(now) };
    if (fields.language !== undefined) values.language = fields.language;
    if (fields.channel !== undefined) values.channel = fields.channel;
    if (fields.notes !== undefined) values.notes = fields.notes;

    await this.guard('putPreferences', { userId }, () => this.redis.hset(this.preferencesKey(userId), values));
    return this.getPreferences(userId);
  }

  async listSessionsByUser(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<TicketSession[]> {
    return this.guard('listSessionsByUser', { userId }, async () => {
      const ids = await this.redis.zrevrange(this.userSessionsKey(userId), 0, limit - 1);
      if (!ids.length) return [];

      const raws = await this.redis.mget(ids.map((id) => this.sessionKey(id)));
      const sessions: TicketSession[] = [];
      for (const raw of raws) {
        if (raw) sessions.push(parseSession(raw));
      }
      return sessions;
    });
  }

  private async guard<T>(op: string, ctx: Record<string, string>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RoutingError) throw err;
      this.log.error({ err, op, ...ctx }, 'Session store operation failed');
      throw new CollaboratorFailureError('store', `${op} failed`, { cause: err });
    }
  }
}

/**
 * In-memory session store (dev/test fallback).
 * Documents are copied in and out so callers never hold a live reference.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, TicketSession>();
  private preferences = new Map<string, PreferenceRecord>();

  async load(sessionId: string): Promise<TicketSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async create(session: TicketSession): Promise<TicketSession> {
    const existing = this.sessions.get(session.sessionId);
    if (existing) return structuredClone(existing);
    this.sessions.set(session.sessionId, structuredClone(session));
    return structuredClone(session);
  }

  async commit(sessionId: string, mutation: SessionMutation): Promise<TicketSession> {
    const current = this.sessions.get(sessionId);
    if (!current) throw new SessionNotFoundError(sessionId);
    const next = applyMutation(current, mutation);
    this.sessions.set(sessionId, structuredClone(next));
    return next;
  }

  async appendMessage(sessionId: string, message: ConversationMessage): Promise<TicketSession> {
    return this.commit(sessionId, { append: [message] });
  }

  async getPreferences(userId: string): Promise<PreferenceRecord> {
    const record = this.preferences.get(userId);
    return record ? { ...record } : { userId };
  }

  async putPreferences(userId: string, fields: PreferenceFields): Promise<PreferenceRecord> {
    const merged = mergePreferences(this.preferences.get(userId) ?? { userId }, fields);
    this.preferences.set(userId, merged);
    return { ...merged };
  }

  async listSessionsByUser(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<TicketSession[]> {
    return Array.from(this.sessions.values())
      .filter((s) => s.externalUserId === userId)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((s) => structuredClone(s));
  }

  /** Test helper: number of stored sessions */
  size(): number {
    return this.sessions.size;
  }
}

/** Decode a stored session document; anything unreadable is a store failure */
export function parseSession(raw: string): TicketSession {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CollaboratorFailureError('store', 'stored session document is not valid JSON', { cause: err });
  }
  if (!isTicketSession(parsed)) {
    throw new CollaboratorFailureError('store', 'stored session document is malformed');
  }
  return parsed;
}

function isTicketSession(value: unknown): value is TicketSession {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sessionId' in value &&
    typeof value.sessionId === 'string' &&
    'status' in value &&
    (value.status === 'open' || value.status === 'resolved' || value.status === 'escalated') &&
    'conversation' in value &&
    Array.isArray(value.conversation) &&
    'tags' in value &&
    Array.isArray(value.tags) &&
    'retrievedArticles' in value &&
    Array.isArray(value.retrievedArticles) &&
    'createdAt' in value &&
    typeof value.createdAt === 'number'
  );
}

/**
 * Factory — create the appropriate session store based on environment.
 */
export function createSessionStore(redis?: Redis): SessionStore {
  if (redis) {
    return new RedisSessionStore(redis);
  }
  logger.warn('Using in-memory session store (no Redis)');
  return new InMemorySessionStore();
}
