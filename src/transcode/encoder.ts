/**
 * Encoder profile system for reelsort
 * Provides platform-specific FFmpeg HEVC configurations and builds the full command line
 */

import { BITRATE_TIERS } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import { runCommand } from '../shared/process.js';
import type {
  Config,
  EncodingProfile,
  EncodingTier,
  HardwareProfile,
  NvidiaEncoderSettings,
  SoftwareEncoderSettings,
  VideoStreamInfo,
} from '../types.js';
import { is4K, isHEVC, looksHDR } from './ffprobe.js';

const logger = getLogger().child('encoder');

const HARDWARE_ENCODERS: Record<Exclude<HardwareProfile, 'software'>, string> = {
  videotoolbox: 'hevc_videotoolbox',
  nvidia: 'hevc_nvenc',
  qsv: 'hevc_qsv',
};

/** Detection order per platform; anything else falls back to software */
const PLATFORM_PREFERENCE: Partial<Record<NodeJS.Platform, Array<Exclude<HardwareProfile, 'software'>>>> = {
  darwin: ['videotoolbox', 'nvidia', 'qsv'],
};
const DEFAULT_PREFERENCE: Array<Exclude<HardwareProfile, 'software'>> = ['nvidia', 'qsv', 'videotoolbox'];

//═══════════════════════════════════════════════════════════════════════════════
// TIERS
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Bitrate and profile tier for a stream
 * 4K: 20000k/25000k/40000k, main10, p010le when HDR
 * otherwise: 7000k/9000k/14000k, main, yuv420p
 */
export function selectEncodingTier(info: VideoStreamInfo | undefined): EncodingTier {
  if (info && is4K(info)) {
    return {
      ...BITRATE_TIERS.uhd,
      profile: 'main10',
      pixFmt: looksHDR(info) ? 'p010le' : 'yuv420p',
    };
  }
  return { ...BITRATE_TIERS.hd, profile: 'main', pixFmt: 'yuv420p' };
}

function rateArgs(tier: EncodingTier): string[] {
  return ['-b:v', tier.bitrate, '-maxrate', tier.maxrate, '-bufsize', tier.bufsize];
}

//═══════════════════════════════════════════════════════════════════════════════
// PROFILES
//═══════════════════════════════════════════════════════════════════════════════

function createVideoToolboxProfile(): EncodingProfile {
  return {
    name: 'videotoolbox',
    encoder: HARDWARE_ENCODERS.videotoolbox,
    hwAccelInput: {},
    videoArgs: (tier) => [...rateArgs(tier), '-profile:v', tier.profile, '-pix_fmt', tier.pixFmt],
  };
}

function createNvidiaProfile(settings: NvidiaEncoderSettings): EncodingProfile {
  const qualityArgs: string[] = ['-preset', settings.preset, '-tune', settings.tune, '-rc', 'vbr'];

  // Lookahead
  if (settings.lookahead > 0) {
    qualityArgs.push('-rc-lookahead', String(settings.lookahead));
  }

  // Adaptive quantization
  if (settings.temporalAq) {
    qualityArgs.push('-temporal-aq', '1');
  }

  return {
    name: 'nvidia',
    encoder: HARDWARE_ENCODERS.nvidia,
    hwAccelInput: { hwaccel: 'cuda' },
    videoArgs: (tier) => [
      ...qualityArgs,
      ...rateArgs(tier),
      '-profile:v',
      tier.profile,
      '-pix_fmt',
      tier.pixFmt,
    ],
  };
}

function createQsvProfile(): EncodingProfile {
  return {
    name: 'qsv',
    encoder: HARDWARE_ENCODERS.qsv,
    hwAccelInput: {},
    videoArgs: (tier) => [...rateArgs(tier), '-profile:v', tier.profile, '-pix_fmt', tier.pixFmt],
  };
}

/** libx265 in CRF mode; 10-bit output uses the planar format x265 accepts */
function createSoftwareProfile(settings: SoftwareEncoderSettings): EncodingProfile {
  return {
    name: 'software',
    encoder: 'libx265',
    hwAccelInput: {},
    videoArgs: (tier) => [
      '-preset',
      settings.preset,
      '-crf',
      String(settings.crf),
      '-profile:v',
      tier.profile,
      '-pix_fmt',
      tier.pixFmt === 'p010le' ? 'yuv420p10le' : tier.pixFmt,
    ],
  };
}

/** Any other ffmpeg encoder, driven by the bitrate tier alone */
function createRawProfile(encoder: string): EncodingProfile {
  return {
    name: encoder,
    encoder,
    hwAccelInput: {},
    videoArgs: (tier) => [...rateArgs(tier), '-profile:v', tier.profile, '-pix_fmt', tier.pixFmt],
  };
}

export function isHardwareProfile(name: string): name is HardwareProfile {
  return name === 'videotoolbox' || name === 'nvidia' || name === 'qsv' || name === 'software';
}

export function createProfile(name: HardwareProfile, config: Config): EncodingProfile {
  switch (name) {
    case 'videotoolbox':
      return createVideoToolboxProfile();
    case 'nvidia':
      return createNvidiaProfile(config.nvidia);
    case 'qsv':
      return createQsvProfile();
    case 'software':
      return createSoftwareProfile(config.software);
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// HARDWARE DETECTION
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Detect the preferred hardware encoder from `ffmpeg -encoders`
 * macOS tries VideoToolbox first; other platforms NVENC, then QSV
 */
export async function detectHardwareProfile(
  ffmpegPath: string,
  platform: NodeJS.Platform = process.platform,
): Promise<HardwareProfile> {
  logger.debug('Auto-detecting hardware profile...');

  let available = '';
  try {
    const { stdout } = await runCommand(ffmpegPath, ['-hide_banner', '-encoders']);
    available = stdout;
  } catch (error) {
    logger.debug('Could not list ffmpeg encoders:', error);
  }

  for (const profile of PLATFORM_PREFERENCE[platform] ?? DEFAULT_PREFERENCE) {
    if (available.includes(HARDWARE_ENCODERS[profile])) {
      logger.info(`Detected ${HARDWARE_ENCODERS[profile]} hardware encoder`);
      return profile;
    }
  }

  logger.info('No hardware encoder detected, using software encoding');
  return 'software';
}

/**
 * Resolve the configured encoder to a profile
 * 'auto' probes ffmpeg; built-in names map to their profile; anything else is a raw encoder
 */
export async function resolveEncodingProfile(config: Config): Promise<EncodingProfile> {
  if (config.encoder === 'auto') {
    return createProfile(await detectHardwareProfile(config.ffmpegPath), config);
  }
  if (isHardwareProfile(config.encoder)) {
    return createProfile(config.encoder, config);
  }
  return createRawProfile(config.encoder);
}

//═══════════════════════════════════════════════════════════════════════════════
// COMMAND LINE
//═══════════════════════════════════════════════════════════════════════════════

export interface FFmpegJob {
  inputPath: string;
  outputPath: string;
  videoStreamInfo?: VideoStreamInfo;
  needsAudioReencode: boolean;
  includeSubtitles: boolean;
}

/** Audio, subtitle and output arguments shared by encodes and remuxes */
function outputArgs(job: FFmpegJob): string[] {
  const args: string[] = [];

  // Audio
  if (job.needsAudioReencode) {
    args.push('-c:a', 'aac', '-b:a', '192k');
  } else {
    args.push('-c:a', 'copy');
  }

  // Subtitles: MP4 only carries text subtitles as mov_text
  if (job.includeSubtitles) {
    args.push('-c:s', 'mov_text');
  } else {
    args.push('-sn');
  }

  args.push('-movflags', '+faststart', '-y', job.outputPath);
  return args;
}

/**
 * Build complete FFmpeg arguments using encoding profile
 */
export function buildFFmpegArgs(profile: EncodingProfile, job: FFmpegJob): string[] {
  const tier = selectEncodingTier(job.videoStreamInfo);
  const args: string[] = ['-hide_banner', '-loglevel', 'error', '-stats'];

  // Hardware acceleration input options
  if (profile.hwAccelInput.hwaccel) {
    args.push('-hwaccel', profile.hwAccelInput.hwaccel);
  }

  // Input file, all streams
  args.push('-i', job.inputPath, '-map', '0');

  // Video
  args.push('-c:v', profile.encoder, ...profile.videoArgs(tier), '-tag:v', 'hvc1');

  return [...args, ...outputArgs(job)];
}

/**
 * Stream-copy a copy-only file into an MP4 container
 * HEVC video gets the hvc1 tag; streams of unknown codec are copied untouched.
 */
export function buildRemuxArgs(job: FFmpegJob): string[] {
  const args: string[] = ['-hide_banner', '-loglevel', 'error', '-stats', '-i', job.inputPath, '-map', '0', '-c:v', 'copy'];
  if (job.videoStreamInfo && isHEVC(job.videoStreamInfo.codec)) {
    args.push('-tag:v', 'hvc1');
  }
  return [...args, ...outputArgs(job)];
}
