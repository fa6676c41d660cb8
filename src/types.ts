/**
 * Types and interfaces for the reelsort pipeline
 *
 * Note: Runtime-validated types are in schemas.ts using Zod.
 * This file contains additional interfaces not covered by Zod schemas.
 */

import type { CONTENT_TYPES } from './shared/constants.js';

// Re-export Zod-inferred types for convenience
export type {
  HardwareProfile,
  NvidiaEncoderSettings,
  SoftwareEncoderSettings,
  UnmatchedMkvPolicy,
  Config,
} from './schemas.js';

//═══════════════════════════════════════════════════════════════════════════════
// IDENTIFICATION
//═══════════════════════════════════════════════════════════════════════════════

/** Media type classification */
export type MediaKind = 'movie' | 'tv';

/** Library subfolder a file belongs to */
export type ContentType = (typeof CONTENT_TYPES)[number];

/**
 * Parsed guess about a file's subject, derived once from its filename stem.
 * Movies never carry season, episode or airDate.
 */
export interface MediaIdentity {
  kind: MediaKind;
  rawStem: string;
  /** Query sent to the metadata provider */
  searchTitle: string;
  season?: number;
  episode?: number;
  /** YYYY-MM-DD */
  airDate?: string;
  /** Year of airDate */
  airYear?: string;
  guessedTitle?: string;
  guessedYear?: string;
}

/** Season/episode or air-date hints for a TV file */
export interface EpisodeHint {
  season?: number;
  episode?: number;
  date?: string;
  dateYear?: string;
}

//═══════════════════════════════════════════════════════════════════════════════
// METADATA
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Outcome of a provider lookup.
 * 'not-found' is a definite answer and is cached; 'error' is transient and is not.
 */
export type Lookup<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'error'; reason: string };

/** A provider match for a movie or series */
export interface ResolvedMetadata {
  externalId: number;
  canonicalTitle: string;
  /** "2020", "2010-", "2010-2015" or "Unknown" */
  yearOrRange: string;
}

/** Provider lookups used by the renaming engine */
export interface MetadataResolver {
  searchMovie(title: string, year?: string): Promise<Lookup<ResolvedMetadata>>;
  searchSeries(title: string, year?: string): Promise<Lookup<ResolvedMetadata>>;
  getEpisodeTitle(externalId: number, season: number, episode: number): Promise<Lookup<string>>;
}

//═══════════════════════════════════════════════════════════════════════════════
// RENAMING
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Final naming decision for one file.
 * When isRenamable is false, destinationRelativePath is the original filename.
 */
export interface RenameOutcome {
  /** Folder(s) and filename, '/'-separated */
  destinationRelativePath: string;
  matchedExternally: boolean;
  isRenamable: boolean;
}

/** A proposed rename from the non-destructive planner */
export interface RenameProposal {
  source: string;
  destination: string;
  matchedExternally: boolean;
  isRenamable: boolean;
}

//═══════════════════════════════════════════════════════════════════════════════
// TRANSCODING
//═══════════════════════════════════════════════════════════════════════════════

/** Primary video stream summary from ffprobe */
export interface VideoStreamInfo {
  codec: string;
  width?: number;
  height?: number;
  pixFmt?: string;
  colorPrimaries?: string;
  colorTransfer?: string;
  colorSpace?: string;
  /** Container duration in seconds */
  duration?: number;
}

/** Bitrate/profile tier chosen from resolution and HDR metadata */
export interface EncodingTier {
  bitrate: string;
  maxrate: string;
  bufsize: string;
  profile: 'main' | 'main10';
  pixFmt: 'yuv420p' | 'p010le';
}

/** FFmpeg arguments for hardware acceleration input */
export interface HWAccelInputArgs {
  hwaccel?: string;
}

/** Complete encoding profile for a specific encoder */
export interface EncodingProfile {
  name: string;
  encoder: string;
  hwAccelInput: HWAccelInputArgs;
  /** Rate control and quality arguments for a tier */
  videoArgs: (tier: EncodingTier) => string[];
}

/** Terminal and intermediate per-file status labels */
export type StageStatus = string;

/**
 * A file with an assigned destination and known transcode requirement.
 * The orchestrator only updates status.
 */
export interface StagedFile {
  /** Current location (staged tree, or queue on dry run) */
  sourcePath: string;
  /** Final location in the completed tree */
  targetPath: string;
  /** Path relative to the content subfolder, e.g. "Show (2020)/Season 01/Show - s01e01.mkv" */
  relativePath: string;
  contentType: ContentType;
  videoStreamInfo?: VideoStreamInfo;
  needsAudioReencode: boolean;
  isCopyOnly: boolean;
  status: StageStatus;
}

/** One staging outcome */
export interface StageResult {
  source: string;
  destination?: string;
  status: StageStatus;
  staged?: StagedFile;
}

/** One transcode outcome */
export interface TranscodeResult {
  source: string;
  destination?: string;
  status: StageStatus;
}

//═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
//═══════════════════════════════════════════════════════════════════════════════

export interface RunCounts {
  ok: number;
  skip: number;
  manual: number;
  fail: number;
  dryRun: number;
}

/** Absolute folder paths for one run */
export interface PipelineRoots {
  queue: string;
  staged: string;
  completed: string;
  errors: string;
}

export type PipelinePhase = 'idle' | 'staging' | 'transcoding' | 'cleanup' | 'done';

export interface PipelineSummary {
  counts: RunCounts;
  roots: PipelineRoots;
  /** True when a shutdown signal stopped submission of new work */
  interrupted: boolean;
  /** Whether the staging phase was skipped to resume a previous run */
  resumed: boolean;
  elapsedSeconds: number;
}
