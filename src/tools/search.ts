/**
 * Offline search over a local document corpus.
 *
 * Stands in for a web search API: ranks documents by how many query terms
 * they contain.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { extractTerms } from '../evaluator/heuristics.js';

export const CorpusDocumentSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  url: z.string().optional(),
});

export type CorpusDocument = z.infer<typeof CorpusDocumentSchema>;

export interface SearchResult {
  snippet: string;
  title: string;
  url: string;
}

export interface CorpusSearchOptions {
  maxResults?: number;
}

export const DEFAULT_CORPUS_PATH = fileURLToPath(new URL('../../data/corpus.json', import.meta.url));

export async function loadCorpus(path: string = DEFAULT_CORPUS_PATH): Promise<CorpusDocument[]> {
  const raw = await readFile(path, 'utf-8');
  return z.array(CorpusDocumentSchema).parse(JSON.parse(raw));
}

export function createCorpusSearch(
  documents: CorpusDocument[],
  options?: CorpusSearchOptions,
): (query: string) => SearchResult[] {
  const maxResults = options?.maxResults ?? 5;
  const indexed = documents.map((doc) => ({
    doc,
    terms: new Set(extractTerms(`${doc.title} ${doc.content}`)),
  }));

  return (query) => {
    const queryTerms = extractTerms(query);
    if (queryTerms.length === 0) return [];

    return indexed
      .map(({ doc, terms }) => ({
        doc,
        score: queryTerms.filter((term) => terms.has(term)).length,
      }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score || a.doc.id.localeCompare(b.doc.id))
      .slice(0, maxResults)
      // Snippet first: downstream tools read the output's values in key order.
      .map(({ doc }) => ({
        snippet: doc.content,
        title: doc.title,
        url: doc.url ?? `corpus://${doc.id}`,
      }));
  };
}
