import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { KnowledgeArticle, KnowledgeHit, KnowledgeSearch } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const ARTICLES_FILE = 'articles.yaml';
const STOP_WORDS_FILE = 'stop-words.txt';

/**
 * Keyword knowledge base loaded from YAML.
 *
 * Scoring: each meaningful query term found in the title or body adds 1,
 * plus 0.5 when it is also one of the article's tags; the sum is divided by
 * the number of terms.
 */
export class KnowledgeService implements KnowledgeSearch {
  private articles: KnowledgeArticle[] = [];
  private stopWords = new Set<string>();
  private log = logger.child({ component: 'knowledge-service' });

  constructor(
    private readonly dir: string = env.knowledge.dir,
    private readonly topK: number = env.knowledge.topK,
  ) {
    this.loadAll();
  }

  loadAll(): void {
    this.articles = this.loadArticles();
    this.stopWords = this.loadStopWords();
    this.log.info({ dir: this.dir, articleCount: this.articles.length }, 'Knowledge base loaded');
  }

  get size(): number {
    return this.articles.length;
  }

  async search(query: string, limit: number = this.topK): Promise<KnowledgeHit[]> {
    const terms = this.filterStopWords(tokenize(query));
    if (terms.length === 0) return [];

    const hits: KnowledgeHit[] = [];
    for (const article of this.articles) {
      const score = scoreText(
        `${article.title} ${article.content}`.toLowerCase(),
        terms,
        article.tags.map((t) => t.toLowerCase()),
      );
      if (score > 0) {
        hits.push({
          articleId: article.id,
          title: article.title,
          content: article.content.trim(),
          tags: article.tags,
          score,
        });
      }
    }

    hits.sort((a, b) => b.score - a.score || a.articleId.localeCompare(b.articleId));
    return hits.slice(0, limit);
  }

  /**
   * Drop stop words and single letters. If nothing is left (e.g. "what is it"),
   * fall back to the original terms.
   */
  private filterStopWords(terms: string[]): string[] {
    const meaningful = terms.filter((t) => !this.stopWords.has(t) && t.length > 1);
    return meaningful.length > 0 ? meaningful : terms;
  }

  private loadArticles(): KnowledgeArticle[] {
    const filepath = path.join(this.dir, ARTICLES_FILE);
    if (!fs.existsSync(filepath)) {
      this.log.warn({ filepath }, 'Knowledge file not found');
      return [];
    }
    const parsed: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
    if (!Array.isArray(parsed)) {
      throw new Error(`${filepath} must contain a list of articles`);
    }
    return parsed.map((entry, i) => toArticle(entry, `${filepath}[${i}]`));
  }

  private loadStopWords(): Set<string> {
    const filepath = path.join(this.dir, STOP_WORDS_FILE);
    if (!fs.existsSync(filepath)) return new Set();
    const words = fs
      .readFileSync(filepath, 'utf-8')
      .split('\n')
      .filter((line) => !line.startsWith('#'))
      .flatMap((line) => line.split(/\s+/))
      .filter(Boolean);
    return new Set(words);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

export function scoreText(text: string, terms: string[], tags: string[]): number {
  if (terms.length === 0) return 0;
  let score = 0;
  for (const term of terms) {
    if (text.includes(term)) {
      score += 1;
      if (tags.includes(term)) score += 0.5;
    }
  }
  return score / terms.length;
}

function toArticle(entry: unknown, where: string): KnowledgeArticle {
  if (typeof entry !== 'object' || entry === null) {
    throw new Error(`${where}: article must be a mapping`);
  }
  const fields = new Map<string, unknown>(Object.entries(entry));
  const [id, title, content, tags, category] = ['id', 'title', 'content', 'tags', 'category'].map((k) => fields.get(k));
  if (typeof id !== 'string' || typeof title !== 'string' || typeof content !== 'string') {
    throw new Error(`${where}: id, title and content are required strings`);
  }
  return {
    id,
    title,
    content,
    tags: Array.isArray(tags) ? tags.map(String) : [],
    category: typeof category === 'string' ? category : 'general',
  };
}
