export interface KnowledgeArticle {
  id: string;
  title: string;
  content: string;
  tags: string[];
  /** Issue type this article is filed under */
  category: string;
}

export interface KnowledgeHit {
  articleId: string;
  title: string;
  content: string;
  tags: string[];
  /** Keyword relevance in [0, 1.5]; not a confidence */
  score: number;
}

/** Knowledge-base search collaborator. Results are ordered best first and finite. */
export interface KnowledgeSearch {
  search(query: string, limit?: number): Promise<KnowledgeHit[]>;
}
