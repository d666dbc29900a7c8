/**
 * Heuristics behind the evaluator's criteria.
 *
 * The research detector and the answer-support matchers are plain predicates
 * so callers can swap them without touching the evaluator. Neither is a proof:
 * support matching is a keyword signal over tool output.
 */

import type { ExecutedStep } from '../trace/types.js';
import type { ResearchPredicate, SupportDecision, SupportInput, SupportMatcher } from './types.js';

/**
 * Question shapes that ask for facts the agent should look up rather than
 * recall. Stored as regex sources so they can live in config.json.
 */
export const DEFAULT_RESEARCH_PATTERNS: readonly string[] = [
  '^\\s*(who|what|when|where|which)\\b',
  '^\\s*how\\s+(many|much|old|long|far|tall)\\b',
  '\\b(capital|population|invented|founded|born|discovered|located|latest|current)\\b',
];

const STOPWORDS = new Set([
  'the', 'and', 'for', 'are', 'was', 'were', 'that', 'this', 'with', 'from',
  'has', 'have', 'had', 'its', 'his', 'her', 'their', 'they', 'you', 'your',
  'not', 'but', 'can', 'will', 'would', 'about', 'into', 'than', 'then',
  'there', 'which', 'what', 'who', 'when', 'where', 'also', 'been',
]);

export function createResearchDetector(
  patterns: readonly string[] = DEFAULT_RESEARCH_PATTERNS,
): ResearchPredicate {
  const compiled = patterns.map((source) => new RegExp(source, 'i'));
  return (question) => compiled.some((pattern) => pattern.test(question));
}

export const isResearchQuestion: ResearchPredicate = createResearchDetector();

/**
 * Flatten opaque tool output to the text it carries.
 * Objects contribute their values in key order, arrays their items.
 */
export function outputText(output: unknown): string {
  if (output === null || output === undefined) return '';
  if (typeof output === 'string') return output.trim();
  if (typeof output === 'number' || typeof output === 'boolean') return String(output);
  if (Array.isArray(output)) {
    return output.map(outputText).filter(Boolean).join('\n');
  }
  if (typeof output === 'object') {
    return Object.values(output).map(outputText).filter(Boolean).join('\n');
  }
  return '';
}

/**
 * Lowercased content terms: digits of any length, words of three or more
 * letters outside the stopword list. Unique, in first-seen order.
 */
export function extractTerms(text: string): string[] {
  const tokens = text.toLowerCase().split(/[^\p{L}\p{N}]+/u);
  const terms = tokens.filter(
    (token) => /^\p{N}+$/u.test(token) || (token.length >= 3 && !STOPWORDS.has(token)),
  );
  return [...new Set(terms)];
}

export function evidenceSteps(steps: ExecutedStep[]): ExecutedStep[] {
  return steps.filter((step) => step.succeeded && outputText(step.output).length > 0);
}

export interface KeywordOverlapOptions {
  /** Shared terms needed; capped at the number of terms in the answer. */
  minSharedTerms?: number;
}

export function createKeywordOverlapMatcher(options?: KeywordOverlapOptions): SupportMatcher {
  const minSharedTerms = Math.max(1, options?.minSharedTerms ?? 2);

  return ({ answer, steps }: SupportInput): SupportDecision => {
    const answerTerms = extractTerms(answer);
    if (answerTerms.length === 0) {
      return { supported: false, detail: 'Final answer has no checkable content' };
    }

    const evidence = new Set(
      evidenceSteps(steps).flatMap((step) => extractTerms(outputText(step.output))),
    );
    const shared = answerTerms.filter((term) => evidence.has(term));
    const needed = Math.min(minSharedTerms, answerTerms.length);

    if (shared.length >= needed) {
      return {
        supported: true,
        detail: `Answer shares ${shared.length} term(s) with tool output: ${shared.slice(0, 5).join(', ')}`,
      };
    }

    return {
      supported: false,
      detail: `Answer shares ${shared.length} of ${needed} required term(s) with tool output`,
    };
  };
}

export const searchOutputMatcher: SupportMatcher = ({ steps }) => {
  const searched = evidenceSteps(steps).some((step) => step.tool === 'search');
  return searched
    ? { supported: true, detail: 'Search produced output before the answer' }
    : { supported: false, detail: 'No search output backs the answer' };
};

export type SupportMode = 'keyword-overlap' | 'search-output';

export function createSupportMatcher(mode: SupportMode, options?: KeywordOverlapOptions): SupportMatcher {
  switch (mode) {
    case 'keyword-overlap':
      return createKeywordOverlapMatcher(options);
    case 'search-output':
      return searchOutputMatcher;
  }
}
