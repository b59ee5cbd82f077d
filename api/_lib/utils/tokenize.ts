/**
 * Shared tokenizer for keyword matching and similarity clustering.
 *
 * Both lexicon phrases and message text go through the same function, so a
 * phrase matches only on whole-token boundaries.
 */

const WORD_RE = /[\p{L}\p{N}]+(?:'[\p{L}\p{N}]+)*/gu;

/**
 * Lowercase word tokens with punctuation removed.
 * Apostrophes inside a word are kept ("don't"), hyphens split ("non-blocking" -> non, blocking).
 */
export function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .replace(/[‘’ʼ]/g, "'")
    .toLowerCase()
    .match(WORD_RE) ?? [];
}

/**
 * Filter tokens through stopword list
 */
export function filterStopwords(tokens: string[], stopwords: ReadonlySet<string>): string[] {
  return tokens.filter(token => !stopwords.has(token));
}

export function tokenizeAndFilter(text: string, stopwords: ReadonlySet<string>): string[] {
  return filterStopwords(tokenize(text), stopwords);
}

/** True when the phrase contains no word characters at all (e.g. "..."). */
export function isPunctuationMarker(phrase: string): boolean {
  return tokenize(phrase).length === 0 && phrase.trim().length > 0;
}
