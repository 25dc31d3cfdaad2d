import Ajv, { ValidateFunction } from 'ajv';
import { ISSUE_TYPES, IssueType, PreferredChannel, SENTIMENTS, Sentiment, StageName, URGENCY_LEVELS, Urgency } from '../config/types';
import { CollaboratorFailureError } from '../orchestrator/errors';

/**
 * JSON contracts for reasoning-engine replies, one per stage.
 * The engine is asked for JSON matching these schemas; anything else is a
 * contract failure.
 */

const ajv = new Ajv({ allErrors: true });

// ───── Classifier ─────

export interface ClassifierOutput {
  issue_type: IssueType;
  urgency: Urgency;
  sentiment: Sentiment;
  summary: string;
}

export const CLASSIFIER_SCHEMA = {
  type: 'object',
  properties: {
    issue_type: {
      type: 'string',
      enum: ISSUE_TYPES,
      description: 'Primary category of the support issue.',
    },
    urgency: {
      type: 'string',
      enum: URGENCY_LEVELS,
      description: 'high = blocked account, data loss or payment failure; medium = degraded experience; low = informational.',
    },
    sentiment: {
      type: 'string',
      enum: SENTIMENTS,
      description: 'Customer sentiment detected from the message.',
    },
    summary: {
      type: 'string',
      description: 'One-line summary of the issue for support staff.',
    },
  },
  required: ['issue_type', 'urgency', 'sentiment', 'summary'],
} as const;

// ───── Retriever ─────

export interface RetrievedArticleOutput {
  article_id?: string;
  title: string;
  summary: string;
  relevance: string;
}

export interface RetrieverOutput {
  confidence: number;
  articles_found: number;
  retrieved_articles: RetrievedArticleOutput[];
}

export const RETRIEVER_SCHEMA = {
  type: 'object',
  properties: {
    confidence: {
      type: 'number',
      minimum: 0,
      maximum: 1,
      description: '0.8-1.0 fully addressed, 0.6-0.79 partially, 0.4-0.59 tangential, below 0.4 not addressed.',
    },
    articles_found: {
      type: 'integer',
      minimum: 0,
      description: 'Number of relevant articles among the search results.',
    },
    retrieved_articles: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          article_id: { type: 'string' },
          title: { type: 'string' },
          summary: { type: 'string' },
          relevance: { type: 'string', description: 'Why the article matters for this customer.' },
        },
        required: ['title', 'summary', 'relevance'],
      },
    },
  },
  required: ['confidence', 'articles_found', 'retrieved_articles'],
} as const;

// ───── Resolver ─────

export interface PreferenceUpdates {
  language?: string;
  channel?: PreferredChannel;
  notes?: string;
}

export interface ResolverOutput {
  outcome: 'resolved' | 'needs_escalation';
  /** Customer-facing answer; required when resolved */
  reply?: string;
  escalation_reason?: string;
  preference_updates?: PreferenceUpdates;
}

export const RESOLVER_SCHEMA = {
  type: 'object',
  properties: {
    outcome: { type: 'string', enum: ['resolved', 'needs_escalation'] },
    reply: {
      type: 'string',
      description: 'The answer sent to the customer. Required when outcome is resolved.',
    },
    escalation_reason: {
      type: 'string',
      description: 'Why a human is needed, when outcome is needs_escalation.',
    },
    preference_updates: {
      type: 'object',
      description: 'Preferences the customer revealed during this message.',
      properties: {
        language: { type: 'string' },
        channel: { type: 'string', enum: ['chat', 'email', 'phone', 'sms'] },
        notes: { type: 'string' },
      },
    },
  },
  required: ['outcome'],
} as const;

// ───── Escalation ─────

export interface EscalationOutput {
  summary: string;
  root_cause: string;
  attempted_steps: string[];
  recommended_action: string;
  customer_message: string;
}

export const ESCALATION_SCHEMA = {
  type: 'object',
  properties: {
    summary: { type: 'string', description: 'Issue summary in one or two sentences.' },
    root_cause: { type: 'string', description: 'Root cause hypothesis.' },
    attempted_steps: { type: 'array', items: { type: 'string' } },
    recommended_action: { type: 'string', description: 'What the human agent should do next.' },
    customer_message: {
      type: 'string',
      minLength: 1,
      description: 'Empathetic message acknowledging the issue. Do not promise a follow-up time.',
    },
  },
  required: ['summary', 'root_cause', 'attempted_steps', 'recommended_action', 'customer_message'],
} as const;

const validators = {
  classifier: ajv.compile<ClassifierOutput>(CLASSIFIER_SCHEMA),
  retriever: ajv.compile<RetrieverOutput>(RETRIEVER_SCHEMA),
  resolver: ajv.compile<ResolverOutput>(RESOLVER_SCHEMA),
  escalation: ajv.compile<EscalationOutput>(ESCALATION_SCHEMA),
};

export function parseClassifierOutput(raw: string): ClassifierOutput {
  return parseWith('classifier', validators.classifier, raw);
}

export function parseRetrieverOutput(raw: string): RetrieverOutput {
  return parseWith('retriever', validators.retriever, raw);
}

export function parseResolverOutput(raw: string): ResolverOutput {
  const output = parseWith('resolver', validators.resolver, raw);
  if (output.outcome === 'resolved' && !output.reply?.trim()) {
    throw new CollaboratorFailureError('contract', 'resolver reported resolved without a reply');
  }
  return output;
}

export function parseEscalationOutput(raw: string): EscalationOutput {
  return parseWith('escalation', validators.escalation, raw);
}

/** Strip markdown code fences if present */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
}

function parseWith<T>(stage: StageName, validate: ValidateFunction<T>, raw: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch (err) {
    throw new CollaboratorFailureError('contract', `${stage} reply is not valid JSON`, { cause: err });
  }

  if (!validate(parsed)) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
    throw new CollaboratorFailureError('contract', `${stage} reply failed validation: ${errors}`);
  }
  return parsed;
}
