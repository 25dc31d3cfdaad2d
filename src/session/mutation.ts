import { InvalidTransitionError } from '../orchestrator/errors';
import { PreferenceFields, PreferenceRecord, SessionMutation, SessionPatch, TicketSession } from './types';

const PATCH_KEYS: ReadonlyArray<keyof SessionPatch> = [
  'issueType',
  'urgency',
  'sentiment',
  'status',
  'retrievalConfidence',
  'articlesFound',
  'externalUserId',
  'summary',
  'tags',
  'retrievedArticles',
  'lastSignal',
  'turn',
];

// undefined in a patch means "leave as is"
function copyDefined<K extends keyof SessionPatch>(target: SessionPatch, patch: SessionPatch, key: K): void {
  const value = patch[key];
  if (value !== undefined) target[key] = value;
}

/** Build a fresh open session */
export function newSession(sessionId: string, externalUserId?: string, now = Date.now()): TicketSession {
  return {
    sessionId,
    status: 'open',
    articlesFound: 0,
    conversation: [],
    externalUserId,
    tags: [],
    retrievedArticles: [],
    turn: 0,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Apply a mutation to a session and return the next version.
 * Shared by every store so that status monotonicity and append-only
 * messages hold regardless of backend.
 */
export function applyMutation(current: TicketSession, mutation: SessionMutation, now = Date.now()): TicketSession {
  const set: SessionPatch = mutation.set ?? {};

  if (set.status !== undefined && set.status !== current.status && current.status !== 'open') {
    throw new InvalidTransitionError(
      current.sessionId,
      `status cannot move from ${current.status} to ${set.status}`,
    );
  }

  const defined: SessionPatch = {};
  for (const key of PATCH_KEYS) {
    copyDefined(defined, set, key);
  }
  const next: TicketSession = { ...current, ...defined, conversation: [...current.conversation] };

  const seen = new Set(next.conversation.map((m) => m.id));
  for (const message of mutation.append ?? []) {
    if (seen.has(message.id)) continue;
    seen.add(message.id);
    next.conversation.push(message);
  }

  if (next.status !== 'open' && current.status === 'open') {
    next.closedAt = now;
  }
  next.updatedAt = now;
  return next;
}

/** Merge preference fields; last write wins per field */
export function mergePreferences(
  existing: PreferenceRecord,
  fields: PreferenceFields,
  now = Date.now(),
): PreferenceRecord {
  const merged: PreferenceRecord = { ...existing };
  if (fields.language !== undefined) merged.language = fields.language;
  if (fields.channel !== undefined) merged.channel = fields.channel;
  if (fields.notes !== undefined) merged.notes = fields.notes;
  merged.updatedAt = now;
  return merged;
}
