/**
 * Research tools
 */

import { ToolRegistry } from './registry.js';
import { createCorpusSearch, type CorpusDocument } from './search.js';
import { summarize } from './summarize.js';

export { ToolRegistry } from './registry.js';
export type {
  ToolHandler,
  RegisterToolOptions,
  ToolInfo,
  ToolExecutionRecord,
} from './registry.js';
export {
  CorpusDocumentSchema,
  DEFAULT_CORPUS_PATH,
  loadCorpus,
  createCorpusSearch,
} from './search.js';
export type { CorpusDocument, SearchResult, CorpusSearchOptions } from './search.js';
export { summarize } from './summarize.js';
export type { SummarizeOptions } from './summarize.js';

export interface DefaultToolsOptions {
  maxSearchResults?: number;
  summaryMaxLength?: number;
  now?: () => Date;
}

/**
 * Registry with the offline `search` and `summarize` tools.
 */
export function createDefaultTools(corpus: CorpusDocument[], options?: DefaultToolsOptions): ToolRegistry {
  const search = createCorpusSearch(corpus, { maxResults: options?.maxSearchResults });
  return new ToolRegistry(options?.now)
    .register('search', search, {
      description: 'Search the local corpus for documents matching the query',
      requiredForResearch: true,
    })
    .register('summarize', (text) => summarize(text, { maxLength: options?.summaryMaxLength }), {
      description: 'Extract the key sentences from previous tool output',
    });
}
