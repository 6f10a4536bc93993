export interface KnowledgeSnippet {
  id: string;
  text: string;
  title?: string;
  source?: string;
  score: number;
}

/**
 * The knowledge-retrieval capability: ranked literature snippets for a query
 */
export interface KnowledgeRetriever {
  readonly name: string;
  query(text: string, topK: number): Promise<KnowledgeSnippet[]>;
}
