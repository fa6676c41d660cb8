/**
 * Shared constants for reelsort
 * Folder layout, status labels and filename patterns used across the pipeline
 */

/** Video file extensions accepted from the queue */
export const VIDEO_EXTENSIONS = ['.mkv', '.mp4', '.avi', '.mov'] as const;

/** Canonical library container */
export const OUTPUT_EXTENSION = '.mp4';

/** Suffix of an in-progress encoder output inside the staged tree */
export const PARTIAL_OUTPUT_SUFFIX = '.transcoding.mp4';

/** Content subfolders present under every root */
export const CONTENT_TYPE_MOVIES = 'Movies';
export const CONTENT_TYPE_TV = 'TV Shows';
export const CONTENT_TYPES = [CONTENT_TYPE_MOVIES, CONTENT_TYPE_TV] as const;

/** Default folder names, relative to the root passed on the command line */
export const DEFAULT_FOLDERS = {
  queue: 'Queue',
  staged: 'Staged',
  completed: 'Completed',
  errors: 'Errors',
} as const;

/** Default paths for configuration discovery */
export const DEFAULT_CONFIG_PATHS = {
  /** XDG config directory name */
  xdgDirName: 'reelsort',
  /** Config filename */
  configFile: 'config.json',
  /** Legacy config filename (in home) */
  homeConfigFile: '.reelsort.json',
} as const;

//═══════════════════════════════════════════════════════════════════════════════
// STATUS LABELS
//═══════════════════════════════════════════════════════════════════════════════

export const STATUS_STAGED = 'STAGED';
export const STATUS_STAGED_HEVC = 'STAGED (HEVC copy)';
export const STATUS_STAGED_NO_INFO = 'STAGED (no codec info)';
export const STATUS_SKIP = 'SKIP';
export const STATUS_OK = 'OK';
export const STATUS_COPY = 'COPY';
export const STATUS_MOVED = 'MOVED';
export const STATUS_FAIL = 'FAIL';
export const STATUS_MANUAL = 'MANUAL REVIEW';
export const STATUS_DRY_RUN = 'DRY-RUN';

//═══════════════════════════════════════════════════════════════════════════════
// FILENAME PATTERNS
//═══════════════════════════════════════════════════════════════════════════════

/** Season/episode token: S01E02, s1e2 */
export const SEASON_EPISODE_PATTERN = /[Ss](\d{1,2})[Ee](\d{1,2})/;

/** Broadcast date token: 2024-03-15, 2024.03.15, 2024_03_15, 2024 03 15 */
export const DATE_PATTERN = /(20\d{2}|19\d{2})[-_. ](0[1-9]|1[0-2])[-_. ](0[1-9]|[12]\d|3[01])/;

/** External id tag embedded in organized names */
export const EXTERNAL_ID_TAG_PATTERN = /\{tmdb-(\d+)\}/;

/** Tag prefix used when rendering the external id */
export const EXTERNAL_ID_TAG_PREFIX = 'tmdb';

/** Release tags stripped from the tail of a guessed title */
export const RELEASE_TAG_PATTERN =
  /\b(480p|720p|1080p|2160p|4k|hdr|hdr10\+?|dv|web[- ]?dl|bluray|webrip|x264|x265|h\.264|h\.265|ddp?\d?\.?\d?|atmos|remux)\b/gi;

/** Characters not allowed in file or folder names */
export const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/** Minimum usable length for a heuristic title */
export const MIN_TITLE_LENGTH = 2;

//═══════════════════════════════════════════════════════════════════════════════
// TRANSCODING
//═══════════════════════════════════════════════════════════════════════════════

/** HEVC codec names (for detection) */
export const HEVC_CODEC_NAMES = ['hevc', 'h265', 'x265', 'libx265'] as const;

/** Source containers whose audio is re-encoded to AAC */
export const AUDIO_REENCODE_EXTENSIONS: ReadonlySet<string> = new Set(['.avi']);

/** Color metadata that marks a stream as HDR */
export const HDR_PRIMARIES: ReadonlySet<string> = new Set(['bt2020']);
export const HDR_TRANSFERS: ReadonlySet<string> = new Set(['smpte2084', 'arib-std-b67']);

/** Bitrate tiers for the hardware encoders */
export const BITRATE_TIERS = {
  uhd: { bitrate: '20000k', maxrate: '25000k', bufsize: '40000k' },
  hd: { bitrate: '7000k', maxrate: '9000k', bufsize: '14000k' },
} as const;

/** Estimated average encode speed (x realtime) and episode length, used for the start-of-run ETA */
export const EST_AVG_SPEED = 1.5;
export const EST_AVG_VIDEO_LENGTH_SECONDS = 2700;

/** Characters of encoder stderr kept for failure diagnostics */
export const STDERR_TAIL_CHARS = 4000;

//═══════════════════════════════════════════════════════════════════════════════
// EXIT CODES
//═══════════════════════════════════════════════════════════════════════════════

export const EXIT_CODES = {
  config: 1,
  missingDependency: 2,
  invalidRoot: 3,
  missingCredential: 4,
} as const;
