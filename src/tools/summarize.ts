/**
 * Extractive summarizer: the leading sentences of the input, capped in length.
 */

export interface SummarizeOptions {
  maxSentences?: number;
  maxLength?: number;
}

export function summarize(text: string, options?: SummarizeOptions): string {
  const maxSentences = options?.maxSentences ?? 2;
  const maxLength = options?.maxLength ?? 500;

  const sentences = text
    .replace(/\s+/g, ' ')
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter(Boolean);

  const summary = sentences.slice(0, maxSentences).join(' ');
  if (summary.length <= maxLength) {
    return summary;
  }
  return `${summary.slice(0, maxLength - 1).trimEnd()}…`;
}
