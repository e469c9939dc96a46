/**
 * Content Filter Service
 *
 * Profanity checks for search results and censoring for file names, backed
 * by the `obscenity` English dataset. Candidates whose title or channel is
 * profane are scored out by the candidate scorer; artist and title are
 * censored before they become library paths. Tags keep the real names.
 */

import {
  RegExpMatcher,
  TextCensor,
  asteriskCensorStrategy,
  englishDataset,
  englishRecommendedTransformers,
} from 'obscenity';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface ContentFilter {
  containsProfanity(text: string): boolean;
  /** Replaces every profane span with asterisks */
  censor(text: string): string;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export class ProfanityFilter implements ContentFilter {
  private readonly matcher = new RegExpMatcher({
    ...englishDataset.build(),
    ...englishRecommendedTransformers,
  });
  private readonly censorer = new TextCensor().setStrategy(asteriskCensorStrategy());

  containsProfanity(text: string): boolean {
    return text.length > 0 && this.matcher.hasMatch(text);
  }

  censor(text: string): string {
    if (!text) return text;
    const matches = this.matcher.getAllMatches(text, true);
    return matches.length > 0 ? this.censorer.applyTo(text, matches) : text;
  }
}

/**
 * The filter for a settings switch: a ProfanityFilter when enabled,
 * otherwise null (nothing filtered, nothing censored).
 */
export function createContentFilter(enabled: boolean): ContentFilter | null {
  return enabled ? new ProfanityFilter() : null;
}
