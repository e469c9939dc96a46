/**
 * Shared type definitions for tunedrop.
 * These interfaces are used by the services, the orchestrator and the CLI.
 */

/** Audio formats the tag writer can handle */
export type AudioFormat = 'mp3';

/** Audio file extensions the pipeline produces (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = ['.mp3'] as const;

/** A user's request, split into artist and title hints */
export interface SearchQuery {
  /** Query exactly as submitted */
  rawText: string;
  /** Artist hint ('' when the query has no "Artist - Title" shape) */
  parsedArtist: string;
  /** Title hint (the whole query when no artist was found) */
  parsedTitle: string;
}

/** One raw search result, before scoring */
export interface Candidate {
  /** Provider-specific video ID */
  id: string;
  /** Video title as published */
  title: string;
  /** Channel display name */
  channel: string;
  /** Uploader display name */
  uploader: string;
  /** Duration in seconds (0 when unknown) */
  durationSeconds: number;
  /** View count (0 when unknown) */
  viewCount: number;
  /** Like count (0 when unknown) */
  likeCount: number;
}

/** Per-component contributions to a candidate's score */
export interface ScoreBreakdown {
  artistMatch: number;
  titleMatch: number;
  wordOverlap: number;
  duration: number;
  officialTitle: number;
  audioTitle: number;
  liveTitle: number;
  tutorialTitle: number;
  compilationTitle: number;
  channelArtist: number;
  channelOfficial: number;
  channelLabel: number;
  views: number;
  likes: number;
}

/** A candidate together with its (signed, integer) score */
export interface ScoredCandidate {
  candidate: Candidate;
  score: number;
  breakdown: ScoreBreakdown;
  /** Title or channel tripped the content filter; score is the profanity penalty */
  profane: boolean;
  /** Artist parsed out of the candidate title ('' if none) */
  videoArtist: string;
  /** Title parsed out of the candidate title */
  videoTitle: string;
}

/** Outcome of ranking a candidate list */
export type SelectionResult =
  | { kind: 'match'; selected: ScoredCandidate; scored: ScoredCandidate[] }
  | { kind: 'no-match'; reason: 'empty' | 'below-threshold'; scored: ScoredCandidate[] };

/** Where a track's metadata came from */
export type MetadataSource = 'resolved' | 'fallback';

/** Resolved tag set for one track */
export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  year: number | null;
  genre: string | null;
  source: MetadataSource;
}

/** Job lifecycle states */
export type JobState = 'queued' | 'running' | 'completed' | 'failed';

/** Terminal outcome of a job, as recorded by the aggregate counters */
export interface JobOutcome {
  state: 'completed' | 'failed';
  usbCopied: boolean;
}

/** Read-only view of a job */
export interface JobSnapshot {
  /** Monotonic job ID, assigned at submission */
  id: number;
  query: SearchQuery;
  state: JobState;
  /** Job log messages in emission order */
  logLines: string[];
  usbCopied: boolean;
  /** Final file path for completed jobs */
  filePath: string | null;
  submittedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

/** Running totals maintained by the orchestrator */
export interface AggregateStatsSnapshot {
  queued: number;
  running: number;
  completed: number;
  failed: number;
  usbCopied: number;
}

/** Reserved log message signalling a successful volume copy */
export const USB_COPY_SUCCESS = 'USB_COPY_SUCCESS';

/** Prefix marking a job log line as a failure */
export const ERROR_MARKER = 'Error:';

/** Application settings */
export interface AppSettings {
  /** Root of the local music library; files land under <musicRoot>/<userName>/<artist>/ */
  musicRoot: string;
  /** Per-user subfolder name */
  userName: string;
  /** Maximum number of jobs running at once (1-10) */
  concurrency: number;
  /** Per-job timeout in seconds (0 = no timeout) */
  jobTimeoutSeconds: number;
  /** Number of search results requested per query (1-50) */
  searchLimit: number;
  /** Audio quality passed to the extractor (e.g. '192K', or a VBR level '0'-'10') */
  audioQuality: string;
  /** Whether the extractor embeds the video thumbnail as cover art */
  embedThumbnail: boolean;
  /** Whether profane results are scored out and profanity is censored in file names */
  contentFilterEnabled: boolean;
  /** Whether to look metadata up in MusicBrainz (otherwise fallback metadata is used) */
  fetchMetadata: boolean;
  /** Whether to cache MusicBrainz results in SQLite across sessions */
  usePersistentCache: boolean;
  /** Whether to copy finished tracks onto a removable volume */
  usbSyncEnabled: boolean;
  /** Whether to eject the volume after a successful copy */
  autoEject: boolean;
  /** Mount roots to scan for removable volumes ([] = platform defaults) */
  volumeRoots: string[];
  /** Path to the yt-dlp binary */
  ytDlpPath: string;
  /** Scratch directory for downloads (null = OS temp dir) */
  workDir: string | null;
  /** User-Agent sent to MusicBrainz */
  musicBrainzUserAgent: string;
}

/** Default application settings (musicRoot and userName are filled in by the settings manager) */
export const DEFAULT_SETTINGS: AppSettings = {
  musicRoot: '',
  userName: '',
  concurrency: 1,
  jobTimeoutSeconds: 0,
  searchLimit: 10,
  audioQuality: '192K',
  embedThumbnail: true,
  contentFilterEnabled: true,
  fetchMetadata: true,
  usePersistentCache: true,
  usbSyncEnabled: true,
  autoEject: false,
  volumeRoots: [],
  ytDlpPath: 'yt-dlp',
  workDir: null,
  musicBrainzUserAgent: 'tunedrop/1.0.0 ( tunedrop@example.com )',
};
