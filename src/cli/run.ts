/**
 * Run CLI Action
 * Loads configuration, checks startup preconditions and drives one pipeline run
 */

import fse from 'fs-extra';
import { loadConfig, resolveRoots, type CliOverrides } from '../config.js';
import { runPipeline } from '../pipeline/coordinator.js';
import { UnmatchedMkvPolicySchema } from '../schemas.js';
import { StartupError } from '../shared/errors.js';
import { createFileSink, getLogger, resolveLogFilePath, type LogLevel } from '../shared/logger.js';
import { checkFFmpegDependencies, setupSignalHandlers } from '../shared/process.js';
import { TMDBClient } from '../tmdb/client.js';
import { resolveEncodingProfile } from '../transcode/encoder.js';
import type { Config, PipelineSummary, UnmatchedMkvPolicy } from '../types.js';

/** Flags shared by every command */
export interface CommonOptions {
  config?: string;
  debug?: boolean;
  quiet?: boolean;
  logDir?: string;
  logFile?: string;
}

/** Options for the run command; undefined means "not given on the command line" */
export interface RunOptions extends CommonOptions {
  dryRun?: boolean;
  overwrite?: boolean;
  skipHevc?: boolean;
  forceAudioReencode?: boolean;
  keepSource?: boolean;
  includeSubtitles?: boolean;
  workers?: number;
  encoder?: string;
  unmatchedMkv?: string;
}

function logLevelFromFlags(options: CommonOptions): LogLevel | undefined {
  if (options.quiet) return 'error';
  if (options.debug) return 'debug';
  return undefined;
}

function parsePolicy(value: string | undefined): UnmatchedMkvPolicy | undefined {
  if (value === undefined) return undefined;
  const result = UnmatchedMkvPolicySchema.safeParse(value);
  if (!result.success) {
    throw new StartupError('config', `Invalid --unmatched-mkv value: ${value}`, [
      `expected one of: ${UnmatchedMkvPolicySchema.options.join(', ')}`,
    ]);
  }
  return result.data;
}

/**
 * Load the layered configuration and apply its logging settings to the shared logger
 */
export async function prepareConfig(options: CommonOptions, cli: CliOverrides): Promise<Config> {
  const logger = getLogger();
  const flagLevel = logLevelFromFlags(options);
  if (flagLevel) logger.setLevel(flagLevel);

  const { config, source } = await loadConfig({
    configPath: options.config,
    cli: { ...cli, logLevel: flagLevel, logDir: options.logDir, logFile: options.logFile },
  });

  logger.setLevel(config.logLevel);
  const logPath = resolveLogFilePath(config.logFile, config.logDir);
  if (logPath) {
    logger.setSink(createFileSink(logPath));
    logger.info(`Logging to ${logPath}`);
  }

  logger.debug(source ? `Loaded config from ${source}` : 'No config file found, using defaults');
  return config;
}

/** Create the metadata client; missing credentials abort with exit code 4 */
export function createResolver(config: Config): TMDBClient {
  return new TMDBClient({
    apiKey: config.tmdb.apiKey,
    readAccessToken: config.tmdb.readAccessToken,
    language: config.tmdb.language,
    timeoutMs: config.requestTimeoutMs,
  });
}

/** Run action handler */
export async function runAction(root: string | undefined, options: RunOptions): Promise<PipelineSummary> {
  const config = await prepareConfig(options, {
    root,
    dryRun: options.dryRun,
    overwrite: options.overwrite,
    skipHevc: options.skipHevc,
    forceAudioReencode: options.forceAudioReencode,
    deleteSource: options.keepSource === undefined ? undefined : !options.keepSource,
    includeSubtitles: options.includeSubtitles,
    workers: options.workers,
    encoder: options.encoder,
    unmatchedMkvPolicy: parsePolicy(options.unmatchedMkv),
  });
  const logger = getLogger();

  // Check dependencies
  const deps = await checkFFmpegDependencies(config.ffmpegPath, config.ffprobePath);
  const missing = [
    ...(deps.ffmpeg ? [] : [`ffmpeg not found at: ${config.ffmpegPath}`]),
    ...(deps.ffprobe ? [] : [`ffprobe not found at: ${config.ffprobePath}`]),
  ];
  if (missing.length > 0) {
    throw new StartupError('missingDependency', 'Required tools are missing', missing);
  }

  // Check root and queue
  if (!config.root) {
    throw new StartupError('invalidRoot', 'No root folder given');
  }
  const roots = resolveRoots(config, config.root);
  const rootStat = await fse.stat(config.root).catch(() => null);
  if (!rootStat?.isDirectory()) {
    throw new StartupError('invalidRoot', `Root folder does not exist: ${config.root}`);
  }
  if (!(await fse.pathExists(roots.queue))) {
    throw new StartupError('invalidRoot', `Queue folder does not exist: ${roots.queue}`);
  }

  const resolver = createResolver(config);
  const profile = await resolveEncodingProfile(config);

  logger.info(`Queue: ${roots.queue}`);
  logger.info(`Completed: ${roots.completed}`);
  logger.info(`Errors: ${roots.errors}`);
  logger.info(
    `Workers: ${config.workers} | encoder: ${profile.encoder} | skip-hevc: ${config.skipHevc} | ` +
      `overwrite: ${config.overwrite} | ${config.deleteSource ? 'source files are moved' : 'source files are kept'}`,
  );
  if (config.dryRun) {
    logger.info('DRY RUN - no files will be moved or transcoded');
  }

  const controller = new AbortController();
  const removeHandlers = setupSignalHandlers(() => controller.abort());
  try {
    return await runPipeline(config, { roots, resolver, profile, signal: controller.signal });
  } finally {
    removeHandlers();
  }
}
