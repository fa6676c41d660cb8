#!/usr/bin/env node

/**
 * reelsort - Identify, rename and transcode loosely named video files into a Plex-style library
 *
 * Main entry point with CLI handling
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { planAction } from './cli/plan.js';
import { runAction, type CommonOptions, type RunOptions } from './cli/run.js';
import { StartupError } from './shared/errors.js';
import { getLogger } from './shared/logger.js';

const VERSION = '1.0.0';

/** A flag's value only when it was typed on the command line, so config and env stay in charge otherwise */
function fromCli<T>(command: Command, key: string, value: T): T | undefined {
  return command.getOptionValueSource(key) === 'cli' ? value : undefined;
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'path to configuration file')
    .option('--log-dir <dir>', 'write a timestamped log file into this directory')
    .option('--log-file <path>', 'append log output to this file')
    .option('--debug', 'enable debug output')
    .option('--quiet', 'only print errors');
}

function commonFlags(command: Command): CommonOptions {
  const opts = command.opts<CommonOptions>();
  return {
    config: opts.config,
    logDir: opts.logDir,
    logFile: opts.logFile,
    debug: opts.debug,
    quiet: opts.quiet,
  };
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name('reelsort')
    .description('Identify, rename and transcode queued video files into Movies / TV Shows folders')
    .version(VERSION)
    .argument('[root]', 'folder holding Queue, Staged, Completed and Errors')
    .option('-n, --dry-run', 'report what would happen without moving or transcoding anything')
    .option('--no-overwrite', 'skip files whose destination already exists')
    .option('--no-skip-hevc', 're-encode sources that are already HEVC')
    .option('--force-audio-reencode', 're-encode audio to AAC for every file')
    .option('--keep-source', 'keep staged sources after a successful transcode')
    .option('--include-subtitles', 'keep subtitle streams (converted to mov_text)')
    .option('-w, --workers <n>', 'number of concurrent transcodes', (value) => Number.parseInt(value, 10))
    .option('--encoder <name>', 'auto, videotoolbox, nvidia, qsv, software or an ffmpeg encoder name')
    .addOption(
      new Option('--unmatched-mkv <policy>', 'routing of .mkv files without a TMDB match').choices([
        'upload-if-renamable',
        'always-manual-review',
      ]),
    );
  addCommonOptions(program);

  program.action(async (root: string | undefined, _options: unknown, command: Command) => {
    const opts = command.opts<RunOptions>();
    const options: RunOptions = {
      ...commonFlags(command),
      dryRun: fromCli(command, 'dryRun', opts.dryRun),
      overwrite: fromCli(command, 'overwrite', opts.overwrite),
      skipHevc: fromCli(command, 'skipHevc', opts.skipHevc),
      forceAudioReencode: fromCli(command, 'forceAudioReencode', opts.forceAudioReencode),
      keepSource: fromCli(command, 'keepSource', opts.keepSource),
      includeSubtitles: fromCli(command, 'includeSubtitles', opts.includeSubtitles),
      workers: fromCli(command, 'workers', opts.workers),
      encoder: fromCli(command, 'encoder', opts.encoder),
      unmatchedMkv: fromCli(command, 'unmatchedMkv', opts.unmatchedMkv),
    };

    const summary = await runAction(root, options);
    if (summary.interrupted) {
      process.exitCode = 130;
    }
  });

  const plan = program
    .command('plan')
    .description('print proposed renames for a folder without moving anything')
    .argument('<folder>', 'folder to analyze');
  addCommonOptions(plan);
  plan.action(async (folder: string, _options: unknown, command: Command) => {
    await planAction(folder, commonFlags(command));
  });

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const logger = getLogger();
  if (error instanceof StartupError) {
    logger.error(error.message);
    for (const detail of error.details) {
      logger.error(`  ${detail}`);
    }
    process.exitCode = error.exitCode;
    return;
  }
  logger.error('Fatal error:', error);
  process.exitCode = 1;
});
