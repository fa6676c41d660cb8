/**
 * Zod schemas for configuration validation
 * Provides runtime type checking and validation for all configuration options
 */

import { z } from 'zod';
import { DEFAULT_FOLDERS } from './shared/constants.js';

//═══════════════════════════════════════════════════════════════════════════════
// ENCODER SCHEMAS
//═══════════════════════════════════════════════════════════════════════════════

/** Built-in encoder profiles */
export const HardwareProfileSchema = z.enum(['videotoolbox', 'nvidia', 'qsv', 'software']);

/**
 * Encoder selection: 'auto', a built-in profile, or a raw ffmpeg encoder name
 * (e.g. "hevc_amf"), which is passed through with the bitrate tier arguments
 */
export const EncoderChoiceSchema = z
  .string()
  .regex(/^[a-z0-9_]+$/i, { message: 'Encoder must be "auto", a profile name or an ffmpeg encoder name' });

/** NVIDIA NVENC encoder settings */
export const NvidiaEncoderSettingsSchema = z.object({
  /** NVENC preset (p1=fastest, p7=slowest/best quality) */
  preset: z.enum(['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7']).default('p5'),
  /** Encoding tune mode */
  tune: z.enum(['hq', 'll', 'ull', 'lossless']).default('hq'),
  /** Number of lookahead frames (0-32) */
  lookahead: z.number().int().min(0).max(32).default(20),
  /** Enable temporal adaptive quantization */
  temporalAq: z.boolean().default(true),
});

/** Software x265 encoder settings */
export const SoftwareEncoderSettingsSchema = z.object({
  /** Encoding preset */
  preset: z
    .enum([
      'ultrafast',
      'superfast',
      'veryfast',
      'faster',
      'fast',
      'medium',
      'slow',
      'slower',
      'veryslow',
    ])
    .default('medium'),
  /** CRF value (0-51, lower = better quality) */
  crf: z.number().int().min(0).max(51).default(23),
});

//═══════════════════════════════════════════════════════════════════════════════
// PIPELINE SCHEMAS
//═══════════════════════════════════════════════════════════════════════════════

/** Where unmatched-but-renamable .mkv files go */
export const UnmatchedMkvPolicySchema = z.enum(['upload-if-renamable', 'always-manual-review']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const FolderNameSchema = z
  .string()
  .min(1)
  .refine((name) => !name.includes('/') && !name.includes('\\'), {
    message: 'Folder names must be a single path segment',
  });

/** Folder names under the root */
export const FoldersSchema = z.object({
  queue: FolderNameSchema.default(DEFAULT_FOLDERS.queue),
  staged: FolderNameSchema.default(DEFAULT_FOLDERS.staged),
  completed: FolderNameSchema.default(DEFAULT_FOLDERS.completed),
  errors: FolderNameSchema.default(DEFAULT_FOLDERS.errors),
});

/** Metadata provider credentials and preferences */
export const TmdbConfigSchema = z.object({
  /** v3 API key, sent as the api_key query parameter */
  apiKey: z.string().min(1).optional(),
  /** v4 read access token, sent as a bearer token */
  readAccessToken: z.string().min(1).optional(),
  /** Response language */
  language: z.string().min(2).default('en-US'),
});

//═══════════════════════════════════════════════════════════════════════════════
// MAIN CONFIGURATION SCHEMA
//═══════════════════════════════════════════════════════════════════════════════

/** Main configuration schema */
export const ConfigSchema = z
  .object({
    // ─── Layout ───────────────────────────────────────────────────────────────
    /** Root directory holding the queue/staged/completed/errors folders */
    root: z.string().min(1).optional(),
    /** Folder names under the root */
    folders: FoldersSchema.default({}),

    // ─── Processing Options ───────────────────────────────────────────────────
    /** Concurrent transcodes */
    workers: z.number().int().min(1).max(16).default(4),
    /** Replace files that already exist in the completed tree */
    overwrite: z.boolean().default(true),
    /** Copy HEVC sources instead of re-encoding them */
    skipHevc: z.boolean().default(true),
    /** Re-encode audio to AAC for every file, not only .avi sources */
    forceAudioReencode: z.boolean().default(false),
    /** Remove the staged source after a successful transcode or move */
    deleteSource: z.boolean().default(true),
    /** Keep subtitle streams (converted to mov_text) */
    includeSubtitles: z.boolean().default(false),
    /** Routing of unmatched .mkv files */
    unmatchedMkvPolicy: UnmatchedMkvPolicySchema.default('upload-if-renamable'),
    /** Minimum seconds between progress lines per file */
    progressIntervalSeconds: z.number().int().min(1).default(60),

    // ─── FFmpeg Configuration ─────────────────────────────────────────────────
    /** Path to ffmpeg binary */
    ffmpegPath: z.string().min(1).default('ffmpeg'),
    /** Path to ffprobe binary */
    ffprobePath: z.string().min(1).default('ffprobe'),
    /** Encoder selection */
    encoder: EncoderChoiceSchema.default('auto'),
    /** NVIDIA-specific encoder settings */
    nvidia: NvidiaEncoderSettingsSchema.default({}),
    /** Software encoder settings */
    software: SoftwareEncoderSettingsSchema.default({}),

    // ─── Metadata Provider ────────────────────────────────────────────────────
    tmdb: TmdbConfigSchema.default({}),
    /** Per-request timeout in milliseconds */
    requestTimeoutMs: z.number().int().min(100).default(10000),

    // ─── Logging ──────────────────────────────────────────────────────────────
    logLevel: LogLevelSchema.default('info'),
    /** Directory receiving a timestamped log file per run */
    logDir: z.string().min(1).optional(),
    /** Explicit log file (wins over logDir) */
    logFile: z.string().min(1).optional(),

    // ─── Runtime Flags ────────────────────────────────────────────────────────
    /** Report what would happen without touching any file */
    dryRun: z.boolean().default(false),
  })
  .strict();

//═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS
//═══════════════════════════════════════════════════════════════════════════════

export type HardwareProfile = z.infer<typeof HardwareProfileSchema>;
export type NvidiaEncoderSettings = z.infer<typeof NvidiaEncoderSettingsSchema>;
export type SoftwareEncoderSettings = z.infer<typeof SoftwareEncoderSettingsSchema>;
export type UnmatchedMkvPolicy = z.infer<typeof UnmatchedMkvPolicySchema>;
export type Config = z.infer<typeof ConfigSchema>;
