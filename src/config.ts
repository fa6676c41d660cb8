/**
 * Configuration module for reelsort
 * Layers defaults, an optional JSONC config file, environment variables and CLI flags
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import fse from 'fs-extra';
import jsonc, { type ParseError } from 'jsonc-parser';
import type { ZodError } from 'zod';
import { ConfigSchema } from './schemas.js';
import { DEFAULT_CONFIG_PATHS } from './shared/constants.js';
import { StartupError } from './shared/errors.js';
import type { Config, PipelineRoots } from './types.js';

type Env = Record<string, string | undefined>;

/** Default configuration values */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/** Settings that can be given on the command line */
export type CliOverrides = Partial<
  Pick<
    Config,
    | 'root'
    | 'dryRun'
    | 'overwrite'
    | 'skipHevc'
    | 'forceAudioReencode'
    | 'deleteSource'
    | 'includeSubtitles'
    | 'workers'
    | 'encoder'
    | 'unmatchedMkvPolicy'
    | 'logLevel'
    | 'logDir'
    | 'logFile'
  >
>;

//═══════════════════════════════════════════════════════════════════════════════
// CONFIG FILE DISCOVERY
//═══════════════════════════════════════════════════════════════════════════════

/** Get default config file paths to check, in priority order */
export function getDefaultConfigPaths(env: Env = process.env): string[] {
  const paths: string[] = [];
  const xdgConfig = env.XDG_CONFIG_HOME;
  const home = env.HOME ?? homedir();

  if (xdgConfig) {
    paths.push(join(xdgConfig, DEFAULT_CONFIG_PATHS.xdgDirName, DEFAULT_CONFIG_PATHS.configFile));
  }
  paths.push(join(home, '.config', DEFAULT_CONFIG_PATHS.xdgDirName, DEFAULT_CONFIG_PATHS.configFile));
  paths.push(join(home, DEFAULT_CONFIG_PATHS.homeConfigFile));

  return paths;
}

/**
 * Find the config file to load
 * An explicit path (flag or $REELSORT_CONFIG) must exist; default locations are optional
 */
export async function findConfigFile(explicitPath?: string, env: Env = process.env): Promise<string | undefined> {
  const requested = explicitPath ?? env.REELSORT_CONFIG;
  if (requested) {
    if (!(await fse.pathExists(requested))) {
      throw new StartupError('config', `Config file not found: ${requested}`);
    }
    return requested;
  }

  for (const path of getDefaultConfigPaths(env)) {
    if (await fse.pathExists(path)) {
      return path;
    }
  }
  return undefined;
}

//═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADING
//═══════════════════════════════════════════════════════════════════════════════

/** Turn zod issues into "field: message" lines */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${field}: ${issue.message}`;
  });
}

/** Parse and validate a JSON-with-comments config file */
export async function loadConfigFile(filePath: string): Promise<Config> {
  const content = await fse.readFile(filePath, 'utf8');
  const errors: ParseError[] = [];
  const raw: unknown = jsonc.parse(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const details = errors.map((e) => `offset ${e.offset}: ${jsonc.printParseErrorCode(e.error)}`);
    throw new StartupError('config', `Invalid JSON in config file: ${filePath}`, details);
  }

  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new StartupError('config', `Invalid config file: ${filePath}`, formatIssues(result.error));
  }
  return result.data;
}

function parseBooleanEnv(value: string): boolean {
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * Apply environment variable overrides
 * Values are re-validated afterwards, so a bad number surfaces as a field error
 */
export function applyEnvOverrides(baseConfig: Config, env: Env = process.env): Config {
  const config: Config = { ...baseConfig, tmdb: { ...baseConfig.tmdb } };

  if (env.TMDB_API_KEY) config.tmdb.apiKey = env.TMDB_API_KEY;
  if (env.TMDB_READ_ACCESS_TOKEN) config.tmdb.readAccessToken = env.TMDB_READ_ACCESS_TOKEN;

  if (env.REELSORT_WORKERS) config.workers = Number(env.REELSORT_WORKERS);
  if (env.REELSORT_ENCODER) config.encoder = env.REELSORT_ENCODER;
  if (env.REELSORT_DRY_RUN !== undefined && env.REELSORT_DRY_RUN !== '') {
    config.dryRun = parseBooleanEnv(env.REELSORT_DRY_RUN);
  }

  if (env.REELSORT_LOG_DIR) config.logDir = env.REELSORT_LOG_DIR;
  if (env.REELSORT_LOG_FILE) config.logFile = env.REELSORT_LOG_FILE;

  if (env.FFMPEG_PATH) config.ffmpegPath = env.FFMPEG_PATH;
  if (env.FFPROBE_PATH) config.ffprobePath = env.FFPROBE_PATH;

  return config;
}

/** Apply CLI flags; undefined flags leave the lower layers in place */
export function applyCliOverrides(baseConfig: Config, cli: CliOverrides): Config {
  const config: Config = { ...baseConfig };
  for (const [key, value] of Object.entries(cli)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }
  return config;
}

export interface LoadConfigOptions {
  configPath?: string;
  cli?: CliOverrides;
  env?: Env;
}

/**
 * Merge configurations with priority: CLI > env > file > defaults
 * Throws StartupError('config') listing every invalid field
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<{ config: Config; source?: string }> {
  const env = options.env ?? process.env;
  const source = await findConfigFile(options.configPath, env);

  let config = source ? await loadConfigFile(source) : DEFAULT_CONFIG;
  config = applyEnvOverrides(config, env);
  config = applyCliOverrides(config, options.cli ?? {});

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new StartupError('config', 'Invalid configuration', formatIssues(result.error));
  }

  const errors = validateConfig(result.data);
  if (errors.length > 0) {
    throw new StartupError('config', 'Invalid configuration', errors);
  }

  return { config: result.data, source };
}

/**
 * Validate cross-field rules the schema cannot express
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];
  const names = Object.values(config.folders);

  if (new Set(names).size !== names.length) {
    errors.push('folders: queue, staged, completed and errors must be distinct');
  }

  return errors;
}

/** Absolute folder paths under the root */
export function resolveRoots(config: Config, root: string): PipelineRoots {
  const base = resolve(root);
  return {
    queue: join(base, config.folders.queue),
    staged: join(base, config.folders.staged),
    completed: join(base, config.folders.completed),
    errors: join(base, config.folders.errors),
  };
}
