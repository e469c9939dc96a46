/**
 * Candidate Scoring Service
 *
 * Ranks raw search results against a parsed query. Every candidate gets a
 * signed integer score built from additive components (artist/title match,
 * word overlap, duration band, title and channel keywords, popularity), and
 * the first candidate with the strictly highest score is selected. Keyword
 * classes are case-insensitive substring tests, so "TaylorSwiftVEVO" counts
 * as an official channel and "Alive" as a live title.
 *
 * With a content filter, a candidate whose title or channel is profane scores
 * exactly the profanity penalty whatever its components add up to.
 *
 * All weights live in DEFAULT_SCORING_WEIGHTS and can be overridden per call.
 */

import {
  Candidate,
  ScoreBreakdown,
  ScoredCandidate,
  SearchQuery,
  SelectionResult,
} from '../../shared/types';
import { ContentFilter } from './contentFilter';
import { splitArtistTitle } from './queryParser';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Tunable weights and thresholds for scoring */
export interface ScoringWeights {
  artistMatch: number;
  titleMatch: number;
  /** Points per distinct query-title word found in the video title */
  wordOverlap: number;
  /** Duration band that looks like a regular track */
  idealDurationMin: number;
  idealDurationMax: number;
  idealDuration: number;
  acceptableDurationMin: number;
  acceptableDurationMax: number;
  acceptableDuration: number;
  /** Applied when the duration is outside both bands */
  durationPenalty: number;
  officialTitle: number;
  audioTitle: number;
  liveTitle: number;
  tutorialTitle: number;
  compilationTitle: number;
  channelArtist: number;
  channelOfficial: number;
  channelLabel: number;
  viewThreshold: number;
  maxViewsBonus: number;
  likeThreshold: number;
  maxLikesBonus: number;
  /** Score of a candidate the content filter rejects */
  profanityPenalty: number;
  /** Best score must be at least this for a match */
  minimumScore: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  artistMatch: 20,
  titleMatch: 20,
  wordOverlap: 5,
  idealDurationMin: 180,
  idealDurationMax: 359,
  idealDuration: 3,
  acceptableDurationMin: 120,
  acceptableDurationMax: 479,
  acceptableDuration: 2,
  durationPenalty: -3,
  officialTitle: 5,
  audioTitle: 3,
  liveTitle: -10,
  tutorialTitle: -15,
  compilationTitle: -20,
  channelArtist: 10,
  channelOfficial: 5,
  channelLabel: 2,
  viewThreshold: 1_000_000,
  maxViewsBonus: 5,
  likeThreshold: 10_000,
  maxLikesBonus: 3,
  profanityPenalty: -100,
  minimumScore: 0,
};

const OFFICIAL_TITLE_PATTERN = /official audio|official video|official music video/i;
const AUDIO_TITLE_PATTERN = /audio|lyrics|visualizer/i;
const LIVE_TITLE_PATTERN = /live|concert|performance|cover|remix|instrumental|karaoke/i;
const TUTORIAL_TITLE_PATTERN = /reaction|review|tutorial|how to|lesson/i;
const COMPILATION_TITLE_PATTERN = /full album|greatest hits|compilation|mix/i;
const CHANNEL_OFFICIAL_PATTERN = /vevo|official/i;
const CHANNEL_LABEL_PATTERN = /music|records|entertainment/i;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Removes every character outside printable ASCII (0x20-0x7E) */
export function stripNonPrintable(text: string): string {
  return text.replace(/[^\x20-\x7E]/g, '');
}

/** Lower-cased alphanumeric words of a string */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
}

function containsIgnoringCase(haystack: string, needle: string): boolean {
  if (!haystack || !needle) return false;
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Bonus on a log10 scale above a threshold, capped and floored to an integer.
 * e.g. 2,000,000 views with threshold 10^6 → floor(min(6.30 - 5, 5)) = 1
 */
function popularityBonus(count: number, threshold: number, maxBonus: number): number {
  if (!(count > threshold)) return 0;
  const exponent = Math.log10(threshold) - 1;
  return Math.max(0, Math.floor(Math.min(Math.log10(count) - exponent, maxBonus)));
}

function durationPoints(seconds: number, weights: ScoringWeights): number {
  if (seconds >= weights.idealDurationMin && seconds <= weights.idealDurationMax) {
    return weights.idealDuration;
  }
  if (seconds >= weights.acceptableDurationMin && seconds <= weights.acceptableDurationMax) {
    return weights.acceptableDuration;
  }
  return weights.durationPenalty;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

/**
 * Scores a single candidate against a query.
 */
export function scoreCandidate(
  query: SearchQuery,
  candidate: Candidate,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS,
  filter: ContentFilter | null = null,
): ScoredCandidate {
  const title = stripNonPrintable(candidate.title).trim();
  const channel = stripNonPrintable(candidate.channel).trim();

  const split = splitArtistTitle(title);
  const videoArtist = split?.artist ?? '';
  const videoTitle = split?.title ?? title;

  const queryWords = new Set(tokenize(query.parsedTitle));
  const videoWords = new Set(tokenize(videoTitle));
  let overlap = 0;
  for (const word of queryWords) {
    if (videoWords.has(word)) overlap++;
  }

  const breakdown: ScoreBreakdown = {
    artistMatch: containsIgnoringCase(videoArtist, query.parsedArtist) ? weights.artistMatch : 0,
    titleMatch: containsIgnoringCase(videoTitle, query.parsedTitle) ? weights.titleMatch : 0,
    wordOverlap: overlap * weights.wordOverlap,
    duration: durationPoints(candidate.durationSeconds, weights),
    officialTitle: OFFICIAL_TITLE_PATTERN.test(title) ? weights.officialTitle : 0,
    audioTitle: AUDIO_TITLE_PATTERN.test(title) ? weights.audioTitle : 0,
    liveTitle: LIVE_TITLE_PATTERN.test(title) ? weights.liveTitle : 0,
    tutorialTitle: TUTORIAL_TITLE_PATTERN.test(title) ? weights.tutorialTitle : 0,
    compilationTitle: COMPILATION_TITLE_PATTERN.test(title) ? weights.compilationTitle : 0,
    channelArtist: containsIgnoringCase(channel, query.parsedArtist) ? weights.channelArtist : 0,
    channelOfficial: CHANNEL_OFFICIAL_PATTERN.test(channel) ? weights.channelOfficial : 0,
    channelLabel: CHANNEL_LABEL_PATTERN.test(channel) ? weights.channelLabel : 0,
    views: popularityBonus(candidate.viewCount, weights.viewThreshold, weights.maxViewsBonus),
    likes: popularityBonus(candidate.likeCount, weights.likeThreshold, weights.maxLikesBonus),
  };

  const profane = filter !== null && (filter.containsProfanity(title) || filter.containsProfanity(channel));
  const score = profane
    ? weights.profanityPenalty
    : Object.values(breakdown).reduce((sum, points) => sum + points, 0);

  return { candidate, score, breakdown, profane, videoArtist, videoTitle };
}

/**
 * Scores every candidate and selects the best one.
 *
 * Candidates are scanned in provider order and a candidate only replaces the
 * current best on a strictly greater score, so ties keep the earlier one.
 */
export function scoreCandidates(
  query: SearchQuery,
  candidates: readonly Candidate[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS,
  filter: ContentFilter | null = null,
): SelectionResult {
  const scored = candidates.map((candidate) => scoreCandidate(query, candidate, weights, filter));

  let best: ScoredCandidate | null = null;
  for (const entry of scored) {
    if (best === null || entry.score > best.score) {
      best = entry;
    }
  }

  if (best === null) {
    return { kind: 'no-match', reason: 'empty', scored };
  }
  if (best.score < weights.minimumScore) {
    return { kind: 'no-match', reason: 'below-threshold', scored };
  }
  return { kind: 'match', selected: best, scored };
}

/**
 * One-line report of a scored candidate for the job log.
 * Only non-zero components are listed.
 */
export function formatScoreReport(entry: ScoredCandidate): string {
  if (entry.profane) {
    return `Score ${entry.score} for "${entry.candidate.title}" [${entry.candidate.id}] (filtered: profanity)`;
  }
  const parts = Object.entries(entry.breakdown)
    .filter(([, points]) => points !== 0)
    .map(([name, points]) => `${name}=${points > 0 ? '+' : ''}${points}`);
  const details = parts.length > 0 ? ` (${parts.join(', ')})` : '';
  return `Score ${entry.score} for "${entry.candidate.title}" [${entry.candidate.id}]${details}`;
}
