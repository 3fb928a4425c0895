import { Injectable } from '@nestjs/common';
import { Contact } from '../telegram-client/interfaces/contact.interface';

export interface MatchResult {
  contact: Contact;
  score: number;
}

/** Score given to every contact when the query is empty */
export const NEUTRAL_SCORE = 100;

/** Minimum score a name match needs to be used without asking */
export const RESOLVE_THRESHOLD = 60;

const WORD_SEPARATOR = /[\s\-_./:]/;

const isWordBoundary = (text: string, index: number): boolean =>
  index === 0 || WORD_SEPARATOR.test(text[index - 1]);

/**
 * Span of the leftmost greedy subsequence match, or null if `query`
 * is not a subsequence of `text`
 */
function subsequenceSpan(query: string, text: string): number | null {
  let queryIndex = 0;
  let first = -1;
  let last = -1;
  for (let i = 0; i < text.length && queryIndex < query.length; i++) {
    if (text[i] === query[queryIndex]) {
      if (first < 0) first = i;
      last = i;
      queryIndex++;
    }
  }
  return queryIndex < query.length ? null : last - first + 1;
}

function boundarySubstringIndex(query: string, text: string): number {
  let index = text.indexOf(query);
  while (index >= 0) {
    if (isWordBoundary(text, index)) return index;
    index = text.indexOf(query, index + 1);
  }
  return -1;
}

/**
 * Tiered fuzzy scoring of contact names.
 *
 * Tiers occupy disjoint bands so a better tier always wins:
 * exact 100, prefix 90-98, substring at a word start 75-88,
 * other substring 60-73, subsequence 1-58. Inside a tier the score
 * grows with the share of the name the query covers.
 */
@Injectable()
export class FuzzyMatcher {
  /**
   * Score `name` against an already trimmed, lowercased query; 0 means no match
   */
  score(queryLower: string, name: string): number {
    const text = name.toLowerCase();
    const q = queryLower.length;
    const n = text.length;

    if (q === 0) return NEUTRAL_SCORE;
    if (q > n) return 0;
    if (text === queryLower) return 100;
    if (text.startsWith(queryLower)) return 90 + Math.floor((9 * q) / n);

    if (boundarySubstringIndex(queryLower, text) > 0) {
      return 75 + Math.floor((14 * q) / n);
    }
    if (text.includes(queryLower)) {
      return 60 + Math.floor((14 * q) / n);
    }

    const span = subsequenceSpan(queryLower, text);
    if (span === null) return 0;
    return 1 + Math.floor((58 * q) / span);
  }

  /**
   * Rank contacts by score, best first; equal scores keep input order
   */
  search(query: string, contacts: readonly Contact[]): MatchResult[] {
    const queryLower = query.trim().toLowerCase();
    if (!queryLower) {
      return contacts.map((contact) => ({ contact, score: NEUTRAL_SCORE }));
    }

    const results: MatchResult[] = [];
    for (const contact of contacts) {
      const score = this.score(queryLower, contact.name);
      if (score > 0) results.push({ contact, score });
    }
    return results.sort((a, b) => b.score - a.score);
  }
}
