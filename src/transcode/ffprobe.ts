/**
 * FFprobe module for reelsort
 * Extracts primary video stream information using ffprobe
 */

import { z } from 'zod';
import { HDR_PRIMARIES, HDR_TRANSFERS, HEVC_CODEC_NAMES } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import { runCommand } from '../shared/process.js';
import type { VideoStreamInfo } from '../types.js';

const logger = getLogger().child('ffprobe');

/** ffprobe -of json output for the selected entries */
const FFProbeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_name: z.string().optional(),
        width: z.number().int().optional(),
        height: z.number().int().optional(),
        pix_fmt: z.string().optional(),
        color_primaries: z.string().optional(),
        color_transfer: z.string().optional(),
        color_space: z.string().optional(),
      }),
    )
    .optional(),
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
});

/** Arguments selecting the first video stream's codec and color metadata */
export function buildProbeArgs(filePath: string): string[] {
  return [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=codec_name,width,height,pix_fmt,color_primaries,color_transfer,color_space:format=duration',
    '-of',
    'json',
    filePath,
  ];
}

/**
 * Probe the primary video stream of a file
 * Returns null when ffprobe fails, prints something unexpected or finds no video stream
 */
export async function probeVideoStream(ffprobePath: string, filePath: string): Promise<VideoStreamInfo | null> {
  logger.debug(`Probing: ${filePath}`);

  let stdout: string;
  try {
    const output = await runCommand(ffprobePath, buildProbeArgs(filePath));
    if (output.code !== 0) {
      logger.debug(`ffprobe exited with code ${output.code}: ${output.stderr.trim()}`);
      return null;
    }
    stdout = output.stdout;
  } catch (error) {
    logger.debug(`ffprobe could not be started for ${filePath}:`, error);
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    logger.debug(`ffprobe printed invalid JSON for ${filePath}`);
    return null;
  }

  const parsed = FFProbeOutputSchema.safeParse(json);
  if (!parsed.success) {
    logger.debug(`Unexpected ffprobe output for ${filePath}`);
    return null;
  }

  const stream = parsed.data.streams?.[0];
  if (!stream) return null;

  const duration = parsed.data.format?.duration ? Number.parseFloat(parsed.data.format.duration) : undefined;

  return {
    codec: stream.codec_name ?? '',
    width: stream.width,
    height: stream.height,
    pixFmt: stream.pix_fmt,
    colorPrimaries: stream.color_primaries,
    colorTransfer: stream.color_transfer,
    colorSpace: stream.color_space,
    duration: duration !== undefined && Number.isFinite(duration) ? duration : undefined,
  };
}

/**
 * Check if a codec is HEVC/H.265
 */
export function isHEVC(codecName: string): boolean {
  return HEVC_CODEC_NAMES.some((name) => name === codecName.toLowerCase());
}

/** 4K or larger: width >= 3800 or height >= 2000 */
export function is4K(info: VideoStreamInfo): boolean {
  return (info.width ?? 0) >= 3800 || (info.height ?? 0) >= 2000;
}

/** HDR by color metadata: bt2020 primaries, or PQ / HLG transfer */
export function looksHDR(info: VideoStreamInfo): boolean {
  return (
    (info.colorPrimaries !== undefined && HDR_PRIMARIES.has(info.colorPrimaries)) ||
    (info.colorTransfer !== undefined && HDR_TRANSFERS.has(info.colorTransfer))
  );
}
