/**
 * Safeguard - Text matchers
 *
 * Pure matching of forbidden terms against plan text atoms. Substring
 * matching is the default; word-boundary matching is the stricter choice.
 */

export type MatchMode = 'substring' | 'word_boundary';

/**
 * Piece of plan text with the path it came from
 */
export type TextAtom = {
  text: string;
  /** e.g. items[0].name or sessions.morning.exercises[1].exerciseType */
  path: string;
};

export type TermMatch = {
  term: string;
  atom: TextAtom;
};

/**
 * Pluggable matcher used by the condition-restriction checks
 */
export interface TextMatcher {
  readonly mode: MatchMode;
  findMatches(atoms: TextAtom[], terms: string[]): TermMatch[];
}

/**
 * Substring match - Case-insensitive
 *
 * WARNING: Can produce false positives (e.g. "ham" matches "hamstring curl")
 */
export function matchSubstring(text: string, term: string): boolean {
  return text.toLowerCase().includes(term.toLowerCase());
}

/**
 * Word boundary match - "jump" matches "jump rope" but not "jumping jacks"
 */
export function matchWordBoundary(text: string, term: string): boolean {
  const escapedTerm = term
    .toLowerCase()
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escapedTerm}\\b`, 'i').test(text.toLowerCase());
}

const MATCHERS: Record<MatchMode, (text: string, term: string) => boolean> = {
  substring: matchSubstring,
  word_boundary: matchWordBoundary,
};

/**
 * One match per (term, atom) pair, in term order then atom order.
 */
export function createTextMatcher(mode: MatchMode = 'substring'): TextMatcher {
  const match = MATCHERS[mode];
  return {
    mode,
    findMatches(atoms, terms) {
      const matches: TermMatch[] = [];
      for (const term of terms) {
        const trimmed = term.trim();
        if (!trimmed) continue;
        for (const atom of atoms) {
          if (match(atom.text, trimmed)) matches.push({ term: trimmed, atom });
        }
      }
      return matches;
    },
  };
}
