/**
 * Track Pipeline
 *
 * The work done for one job: search → score → download → resolve metadata →
 * write tags → organize → volume sync. Progress is reported only through the
 * job context's emit(); fatal problems are thrown as PipelineErrors and turned
 * into "Error: ..." log lines by the orchestrator.
 *
 * Shared resources (metadata cache, MusicBrainz rate limiter) are owned here
 * and used by every job, so concurrent jobs never burst past the API limit.
 *
 * With the content filter on, profane candidates are scored out and the
 * artist and title are censored before they become library paths. Tags keep
 * the resolved names.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AppSettings,
  DEFAULT_SETTINGS,
  ScoredCandidate,
  SearchQuery,
  TrackMetadata,
  USB_COPY_SUCCESS,
} from '../../shared/types';
import {
  DEFAULT_SCORING_WEIGHTS,
  ScoringWeights,
  formatScoreReport,
  scoreCandidates,
} from './candidateScorer';
import { ContentFilter, createContentFilter } from './contentFilter';
import { DownloadExecutor, YtDlpDownloadExecutor } from './downloadExecutor';
import { JobCancelledError, NoSearchResultsError, NoSuitableMatchError } from './errors';
import { JobContext, JobRunResult, JobRunner } from './jobOrchestrator';
import { Logger } from './logger';
import {
  IMetadataCache,
  MetadataCache,
  MetadataResolverOptions,
  MusicBrainzRateLimiter,
  resolveMetadata,
} from './metadataResolver';
import { PersistentCacheDatabase, PersistentMetadataCache } from './persistentCache';
import { cleanTrackTitle } from './queryParser';
import { SearchProvider, YtDlpSearchProvider } from './searchProvider';
import { getCurrentUserName } from './settingsManager';
import { writeAndVerifyTags } from './tagWriter';
import { VolumeSync } from './volumeSync';
import { organizeArtifact } from '../utils/fileOrganizer';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for the track pipeline */
export interface TrackPipelineOptions {
  /** Application settings */
  settings?: AppSettings;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Search provider (defaults to yt-dlp search) */
  searchProvider?: SearchProvider;
  /** Download executor (defaults to yt-dlp extraction) */
  downloadExecutor?: DownloadExecutor;
  /** Volume sync (defaults to one built from settings) */
  volumeSync?: VolumeSync;
  /** Metadata cache (defaults to persistent or in-memory per settings) */
  metadataCache?: IMetadataCache;
  /** Options for the metadata resolver (for testing) */
  metadataResolverOptions?: MetadataResolverOptions;
  /** Scoring weights */
  scoringWeights?: ScoringWeights;
  /** Writes tags to the downloaded file (for testing) */
  tagWriter?: (filePath: string, metadata: TrackMetadata, jobId: number) => void;
  /** Content filter (defaults to one built from settings; null disables filtering) */
  contentFilter?: ContentFilter | null;
}

/** Artist/title used for the metadata lookup */
export interface LookupTerms {
  artist: string;
  title: string;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Chooses the artist/title to look up for a selected candidate.
 *
 * Artist: the query's artist, else the artist in the video title, else the
 * channel name. Title: the query's title when the query named an artist,
 * otherwise the cleaned video title (falling back to the query's title).
 */
export function chooseLookupTerms(query: SearchQuery, selected: ScoredCandidate): LookupTerms {
  const artist = query.parsedArtist || selected.videoArtist || selected.candidate.channel.trim();

  if (query.parsedArtist) {
    return { artist, title: query.parsedTitle };
  }

  const cleaned = cleanTrackTitle(selected.videoTitle);
  return { artist, title: cleaned || query.parsedTitle };
}

/** Throws JobCancelledError once the job's signal has fired */
function throwIfAborted(context: JobContext): void {
  if (context.signal.aborted) {
    throw new JobCancelledError('Job aborted', { jobId: context.jobId });
  }
}

function describeMetadata(metadata: TrackMetadata): string {
  const parts = [`${metadata.artist} - ${metadata.title}`];
  if (metadata.album) parts.push(`album "${metadata.album}"`);
  if (metadata.year !== null) parts.push(String(metadata.year));
  if (metadata.genre) parts.push(metadata.genre);
  return `Metadata (${metadata.source}): ${parts.join(', ')}`;
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

export class TrackPipeline implements JobRunner {
  private readonly settings: AppSettings;
  private readonly logger: Logger | null;
  private readonly searchProvider: SearchProvider;
  private readonly downloadExecutor: DownloadExecutor;
  private readonly volumeSync: VolumeSync;
  private readonly scoringWeights: ScoringWeights;
  private readonly metadataResolverOptions: MetadataResolverOptions;
  private readonly tagWriter: (filePath: string, metadata: TrackMetadata, jobId: number) => void;
  private readonly contentFilter: ContentFilter | null;

  // Persistent cache database (null if using an in-memory or injected cache)
  private persistentDb: PersistentCacheDatabase | null = null;
  private readonly metadataCache: IMetadataCache;
  // Shared by every job
  private readonly musicBrainzRateLimiter: MusicBrainzRateLimiter;

  constructor(options: TrackPipelineOptions = {}) {
    this.settings = options.settings ?? { ...DEFAULT_SETTINGS };
    this.logger = options.logger ?? null;
    this.scoringWeights = options.scoringWeights ?? DEFAULT_SCORING_WEIGHTS;

    this.searchProvider =
      options.searchProvider ??
      new YtDlpSearchProvider({
        limit: this.settings.searchLimit,
        binaryPath: this.settings.ytDlpPath,
      });
    this.downloadExecutor =
      options.downloadExecutor ??
      new YtDlpDownloadExecutor({
        workDir: this.settings.workDir,
        audioQuality: this.settings.audioQuality,
        embedThumbnail: this.settings.embedThumbnail,
        binaryPath: this.settings.ytDlpPath,
      });
    this.volumeSync =
      options.volumeSync ??
      new VolumeSync({ enabled: this.settings.usbSyncEnabled, autoEject: this.settings.autoEject });

    this.metadataCache = options.metadataCache ?? this.createMetadataCache();
    this.musicBrainzRateLimiter = new MusicBrainzRateLimiter(1100);
    this.metadataResolverOptions = {
      userAgent: this.settings.musicBrainzUserAgent,
      ...options.metadataResolverOptions,
      enabled: options.metadataResolverOptions?.enabled ?? this.settings.fetchMetadata,
    };
    this.tagWriter =
      options.tagWriter ??
      ((filePath, metadata, jobId): void => writeAndVerifyTags(filePath, metadata, { jobId }));
    this.contentFilter =
      options.contentFilter === undefined
        ? createContentFilter(this.settings.contentFilterEnabled)
        : options.contentFilter;
  }

  /** Name used in library and volume paths */
  private pathName(name: string): string {
    return this.contentFilter ? this.contentFilter.censor(name) : name;
  }

  /**
   * Persistent SQLite cache when enabled in settings, falling back to an
   * in-memory cache if the database cannot be opened.
   */
  private createMetadataCache(): IMetadataCache {
    if (!this.settings.usePersistentCache) {
      this.logger?.info('Initialized in-memory metadata cache');
      return new MetadataCache();
    }

    const db = new PersistentCacheDatabase();
    try {
      db.initialize();
      this.persistentDb = db;
      this.logger?.info('Initialized persistent cache (SQLite)');
      return new PersistentMetadataCache(db);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Persistent cache unavailable (${message}); using in-memory cache`);
      return new MetadataCache();
    }
  }

  /** Releases the cache database, if one was opened */
  close(): void {
    this.persistentDb?.close();
    this.persistentDb = null;
  }

  /**
   * Runs one job.
   *
   * @throws PipelineError for every fatal step failure
   */
  async run(query: SearchQuery, context: JobContext): Promise<JobRunResult> {
    const { emit, jobId, signal } = context;

    // Step 1: Search
    emit(`Searching for "${query.rawText}"`);
    const candidates = await this.searchProvider.search(query.rawText, signal);
    throwIfAborted(context);
    if (candidates.length === 0) {
      throw new NoSearchResultsError(`No results for "${query.rawText}"`, { jobId });
    }
    emit(`Found ${candidates.length} candidates`);

    // Step 2: Score
    const selection = scoreCandidates(query, candidates, this.scoringWeights, this.contentFilter);
    for (const entry of selection.scored) {
      emit(formatScoreReport(entry));
    }
    if (selection.kind === 'no-match') {
      const bestScore = Math.max(...selection.scored.map((entry) => entry.score));
      throw new NoSuitableMatchError(
        `No candidate scored at least ${this.scoringWeights.minimumScore} (best: ${bestScore})`,
        { jobId, bestScore },
      );
    }
    const selected = selection.selected;
    emit(`Selected "${selected.candidate.title}" (score ${selected.score})`);

    // Step 3: Download
    emit('Downloading');
    const artifact = await this.downloadExecutor.download(selected.candidate, signal);
    emit(`Downloaded ${path.basename(artifact.filePath)}`);

    let organized = false;
    try {
      throwIfAborted(context);

      // Step 4: Resolve metadata
      const terms = chooseLookupTerms(query, selected);
      emit(`Looking up metadata for ${terms.artist} - ${terms.title}`);
      const metadata = await resolveMetadata(
        terms.artist,
        terms.title,
        {
          ...this.metadataResolverOptions,
          onLookupFailure: (error) => {
            this.logger?.warn(error.message, { category: error.category, jobId, step: error.step });
            emit(`Warning: ${error.toUserMessage()}; using fallback metadata`);
          },
        },
        this.metadataCache,
        this.musicBrainzRateLimiter,
      );
      emit(describeMetadata(metadata));
      throwIfAborted(context);

      // Step 5: Write tags
      this.tagWriter(artifact.filePath, metadata, jobId);
      emit('Tags written and verified');

      // Step 6: Organize
      const artistDir = this.pathName(metadata.artist);
      const finalPath = organizeArtifact(
        artifact.filePath,
        {
          musicRoot: this.settings.musicRoot || path.join(os.homedir(), 'Music', 'Downloaded'),
          userName: this.settings.userName || getCurrentUserName(),
          artist: artistDir,
          title: this.pathName(metadata.title),
        },
        jobId,
      );
      organized = true;
      emit(`Saved to ${finalPath}`);

      // Step 7: Volume sync (never fatal). A cancelled job keeps its library copy.
      throwIfAborted(context);
      await this.syncToVolume(finalPath, artistDir, context);

      return { filePath: finalPath };
    } finally {
      if (!organized) {
        await removeQuietly(artifact.filePath, this.logger, jobId);
      }
    }
  }

  private async syncToVolume(filePath: string, artist: string, context: JobContext): Promise<void> {
    if (!this.volumeSync.isEnabled()) return;

    const result = await this.volumeSync.trySync(filePath, artist, context.jobId);
    switch (result.status) {
      case 'disabled':
        return;
      case 'no-volume':
        context.emit('No removable volume found; skipping copy');
        return;
      case 'copied':
        context.emit(USB_COPY_SUCCESS);
        context.emit(`Copied to ${result.destination}`);
        if (result.ejected) {
          context.emit(`Ejected ${result.volumeRoot}`);
        }
        return;
      case 'error':
        this.logger?.logPipelineError(result.error);
        context.emit(`Warning: ${result.error.toUserMessage()}`);
        return;
    }
  }
}

/** Deletes a scratch file left behind by a failed job */
async function removeQuietly(filePath: string, logger: Logger | null, jobId: number): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error: unknown) {
    logger?.logError(error, { jobId, step: 'cleanup' });
  }
}
