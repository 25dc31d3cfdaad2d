import { RetrievedArticle } from '../config/types';
import { KnowledgeHit, KnowledgeSearch } from '../knowledge/types';
import { ReasoningEngine } from '../llm/types';
import { asCollaboratorFailure } from '../orchestrator/errors';
import { RetrievalResultSignal } from '../routing/types';
import { TicketSession } from '../session/types';
import { PromptManager } from './prompt-manager';
import { RETRIEVER_SCHEMA, RetrievedArticleOutput, parseRetrieverOutput } from './stage-contracts';
import { Stage, StageContext, StageResult } from './types';
import { formatClassification, stageMessage } from './stage-utils';

/**
 * Retriever — searches the knowledge base for the customer's topic and has
 * the reasoning engine score how well the results answer it. Leaves the
 * classification untouched.
 */
export class RetrieverStage implements Stage {
  readonly name = 'retriever' as const;

  constructor(
    private readonly engine: ReasoningEngine,
    private readonly knowledge: KnowledgeSearch,
    private readonly prompts: PromptManager,
  ) {}

  async run(ctx: StageContext): Promise<StageResult> {
    const { session, store, log } = ctx;

    // Search for what the ticket was opened about, not a later follow-up
    const topic = openingMessage(session) ?? ctx.message;
    const query = session.issueType && session.issueType !== 'general'
      ? `${session.issueType} ${topic}`
      : topic;

    let hits: KnowledgeHit[];
    try {
      hits = await this.knowledge.search(query);
    } catch (err) {
      throw asCollaboratorFailure('knowledge', err);
    }
    log.debug({ query, hits: hits.length }, 'Knowledge search complete');

    const inference = await this.engine.infer({
      stage: this.name,
      sessionId: session.sessionId,
      instructions: this.prompts.get(this.name),
      context: [formatClassification(session), formatHits(hits)].join('\n\n'),
      customerMessage: topic,
      responseSchema: RETRIEVER_SCHEMA,
    });
    const output = parseRetrieverOutput(inference.content);

    const signal: RetrievalResultSignal = {
      type: 'retrieval_result',
      confidence: output.confidence,
      articlesFound: output.articles_found,
    };
    const note = stageMessage(
      session,
      this.name,
      'note',
      'internal',
      `RETRIEVAL_RESULT: confidence=${output.confidence.toFixed(2)}, articles_found=${output.articles_found}`,
    );

    const next = await store.commit(session.sessionId, {
      set: {
        retrievalConfidence: output.confidence,
        articlesFound: output.articles_found,
        retrievedArticles: output.retrieved_articles.map((a) => toRetrievedArticle(a, hits)),
        lastSignal: signal,
      },
      append: [note],
    });

    log.info({ confidence: output.confidence, articlesFound: output.articles_found }, 'Retrieval scored');
    return { session: next, signal };
  }
}

export function formatHits(hits: KnowledgeHit[]): string {
  if (hits.length === 0) return 'Knowledge base results: none matched this message.';
  const lines = [`Knowledge base results (${hits.length}):`];
  for (const hit of hits) {
    lines.push(`[${hit.articleId}] ${hit.title} (score ${hit.score.toFixed(2)})`);
    if (hit.tags.length > 0) lines.push(`  tags: ${hit.tags.join(', ')}`);
    lines.push(`  ${hit.content}`);
  }
  return lines.join('\n');
}

/** First customer message on the session */
export function openingMessage(session: TicketSession): string | undefined {
  return session.conversation.find((m) => m.role === 'customer')?.content;
}

function toRetrievedArticle(article: RetrievedArticleOutput, hits: KnowledgeHit[]): RetrievedArticle {
  const articleId = article.article_id ?? hits.find((h) => h.title === article.title)?.articleId ?? 'unknown';
  return { articleId, title: article.title, summary: article.summary, relevance: article.relevance };
}
