import type { WikiPage } from "../platform/records.js";

export interface RetrievalHit {
  path: string;
  snippet: string;
  score: number;
}

/**
 * Advisory document search. Results feed the solver; they are never
 * consulted for security decisions.
 */
export interface Retriever {
  search(query: string, limit: number): Promise<RetrievalHit[]>;
}

const SNIPPET_RADIUS = 120;

function terms(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 2);
}

/**
 * Ranks pages by the share of query terms they contain; the path counts
 * double. Snippets are cut around the first matching term.
 */
export class KeywordWikiRetriever implements Retriever {
  constructor(private readonly loadPages: () => Promise<WikiPage[]>) {}

  public async search(query: string, limit: number): Promise<RetrievalHit[]> {
    const queryTerms = Array.from(new Set(terms(query)));
    if (queryTerms.length === 0) {
      return [];
    }
    const pages = await this.loadPages();
    const hits: RetrievalHit[] = [];
    for (const page of pages) {
      const body = page.content.toLowerCase();
      const pathText = page.path.toLowerCase();
      let score = 0;
      let firstIndex = -1;
      for (const term of queryTerms) {
        const index = body.indexOf(term);
        if (index >= 0) {
          score += 1;
          if (firstIndex < 0 || index < firstIndex) firstIndex = index;
        }
        if (pathText.includes(term)) {
          score += 2;
        }
      }
      if (score === 0) continue;
      hits.push({
        path: page.path,
        snippet: snippetAround(page.content, Math.max(firstIndex, 0)),
        score: Number((score / (queryTerms.length * 3)).toFixed(3)),
      });
    }
    return hits
      .sort((a, b) => b.score - a.score || a.path.localeCompare(b.path))
      .slice(0, limit);
  }
}

function snippetAround(content: string, index: number): string {
  const start = Math.max(0, index - SNIPPET_RADIUS);
  const end = Math.min(content.length, index + SNIPPET_RADIUS);
  const prefix = start > 0 ? "…" : "";
  const suffix = end < content.length ? "…" : "";
  return `${prefix}${content.slice(start, end).trim()}${suffix}`;
}
