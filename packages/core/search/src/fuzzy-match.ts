/**
 * Fuzzy text matching used by the search engine
 */

import { similarityRatio } from './sequence-matcher.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;
export const MIN_FUZZY_WORD_LENGTH = 3;

/**
 * Match a lower-cased query against lower-cased text.
 *
 * Succeeds on plain containment, then per word: query words shorter than
 * MIN_FUZZY_WORD_LENGTH are skipped, the rest match a text word that
 * contains them, is contained by them, or is similar enough.
 */
export function fuzzyMatch(text: string, query: string, threshold: number = DEFAULT_SIMILARITY_THRESHOLD): boolean {
  if (text.includes(query)) {
    return true;
  }

  const queryWords = splitWords(query);
  const textWords = splitWords(text);

  for (const queryWord of queryWords) {
    if (queryWord.length < MIN_FUZZY_WORD_LENGTH) continue;

    for (const textWord of textWords) {
      if (textWord.includes(queryWord) || queryWord.includes(textWord)) {
        return true;
      }
      if (similarityRatio(queryWord, textWord) >= threshold) {
        return true;
      }
    }
  }

  return false;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}
