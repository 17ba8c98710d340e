/**
 * Tokenizer for lexical scoring
 *
 * Terms are maximal runs of ASCII letters and digits after lowercasing.
 * Everything else (punctuation, whitespace, non-ASCII) separates terms.
 */

const TERM_RE = /[a-z0-9]+/g;

export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TERM_RE) ?? [];
}
