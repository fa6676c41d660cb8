/**
 * Encoder Unit Tests
 *
 * Tests for tier selection, profile construction, hardware detection
 * and the ffmpeg command line.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../src/shared/process.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/shared/process.js')>()),
  runCommand: vi.fn(),
}));

import { DEFAULT_CONFIG } from '../../src/config.js';
import { runCommand } from '../../src/shared/process.js';
import {
  buildFFmpegArgs,
  buildRemuxArgs,
  createProfile,
  detectHardwareProfile,
  resolveEncodingProfile,
  selectEncodingTier,
} from '../../src/transcode/encoder.js';
import type { VideoStreamInfo } from '../../src/types.js';

const mockRunCommand = vi.mocked(runCommand);

const UHD_HDR: VideoStreamInfo = {
  codec: 'h264',
  width: 3840,
  height: 2160,
  colorPrimaries: 'bt2020',
  colorTransfer: 'smpte2084',
  duration: 3600,
};

const FULL_HD: VideoStreamInfo = {
  codec: 'h264',
  width: 1920,
  height: 1080,
  colorPrimaries: 'bt709',
  colorTransfer: 'bt709',
};

function encoderList(...names: string[]): string {
  return ['Encoders:', ...names.map((name) => ` V....D ${name}             some encoder`)].join('\n');
}

describe('encoder', () => {
  beforeEach(() => {
    mockRunCommand.mockReset();
  });

  // ============================================================================
  // TIERS
  // ============================================================================

  describe('selectEncodingTier', () => {
    it('should use the 4K tier with 10-bit output for HDR', () => {
      expect(selectEncodingTier(UHD_HDR)).toEqual({
        bitrate: '20000k',
        maxrate: '25000k',
        bufsize: '40000k',
        profile: 'main10',
        pixFmt: 'p010le',
      });
    });

    it('should keep 8-bit output for 4K SDR', () => {
      expect(selectEncodingTier({ codec: 'h264', width: 3840, height: 2160, colorPrimaries: 'bt709' })).toEqual({
        bitrate: '20000k',
        maxrate: '25000k',
        bufsize: '40000k',
        profile: 'main10',
        pixFmt: 'yuv420p',
      });
    });

    it('should treat a 2000 pixel tall stream as 4K', () => {
      expect(selectEncodingTier({ codec: 'h264', width: 3600, height: 2000 }).bitrate).toBe('20000k');
    });

    it('should use the HD tier otherwise', () => {
      const hd = { bitrate: '7000k', maxrate: '9000k', bufsize: '14000k', profile: 'main', pixFmt: 'yuv420p' };
      expect(selectEncodingTier(FULL_HD)).toEqual(hd);
      expect(selectEncodingTier(undefined)).toEqual(hd);
    });
  });

  // ============================================================================
  // COMMAND LINE
  // ============================================================================

  describe('buildFFmpegArgs', () => {
    it('should build an NVENC command for 4K HDR', () => {
      const profile = createProfile('nvidia', DEFAULT_CONFIG);

      const args = buildFFmpegArgs(profile, {
        inputPath: '/staged/in.mkv',
        outputPath: '/staged/in.transcoding.mp4',
        videoStreamInfo: UHD_HDR,
        needsAudioReencode: false,
        includeSubtitles: false,
      });

      expect(args).toEqual([
        '-hide_banner', '-loglevel', 'error', '-stats',
        '-hwaccel', 'cuda',
        '-i', '/staged/in.mkv', '-map', '0',
        '-c:v', 'hevc_nvenc',
        '-preset', 'p5', '-tune', 'hq', '-rc', 'vbr', '-rc-lookahead', '20', '-temporal-aq', '1',
        '-b:v', '20000k', '-maxrate', '25000k', '-bufsize', '40000k',
        '-profile:v', 'main10', '-pix_fmt', 'p010le',
        '-tag:v', 'hvc1',
        '-c:a', 'copy',
        '-sn',
        '-movflags', '+faststart', '-y', '/staged/in.transcoding.mp4',
      ]);
    });

    it('should re-encode audio and convert subtitles when asked', () => {
      const profile = createProfile('videotoolbox', DEFAULT_CONFIG);

      const args = buildFFmpegArgs(profile, {
        inputPath: '/staged/old.avi',
        outputPath: '/staged/old.transcoding.mp4',
        videoStreamInfo: FULL_HD,
        needsAudioReencode: true,
        includeSubtitles: true,
      });

      expect(args).toEqual([
        '-hide_banner', '-loglevel', 'error', '-stats',
        '-i', '/staged/old.avi', '-map', '0',
        '-c:v', 'hevc_videotoolbox',
        '-b:v', '7000k', '-maxrate', '9000k', '-bufsize', '14000k',
        '-profile:v', 'main', '-pix_fmt', 'yuv420p',
        '-tag:v', 'hvc1',
        '-c:a', 'aac', '-b:a', '192k',
        '-c:s', 'mov_text',
        '-movflags', '+faststart', '-y', '/staged/old.transcoding.mp4',
      ]);
    });

    it('should use CRF and the x265 10-bit format for software encoding', () => {
      const profile = createProfile('software', DEFAULT_CONFIG);

      expect(profile.encoder).toBe('libx265');
      expect(profile.videoArgs(selectEncodingTier(UHD_HDR))).toEqual([
        '-preset', 'medium', '-crf', '23', '-profile:v', 'main10', '-pix_fmt', 'yuv420p10le',
      ]);
    });
  });

  describe('buildRemuxArgs', () => {
    it('should stream-copy HEVC video into MP4 with the hvc1 tag', () => {
      const args = buildRemuxArgs({
        inputPath: '/staged/show.mkv',
        outputPath: '/staged/show.transcoding.mp4',
        videoStreamInfo: { ...FULL_HD, codec: 'hevc' },
        needsAudioReencode: false,
        includeSubtitles: true,
      });

      expect(args).toEqual([
        '-hide_banner', '-loglevel', 'error', '-stats',
        '-i', '/staged/show.mkv', '-map', '0',
        '-c:v', 'copy', '-tag:v', 'hvc1',
        '-c:a', 'copy',
        '-c:s', 'mov_text',
        '-movflags', '+faststart', '-y', '/staged/show.transcoding.mp4',
      ]);
    });

    it('should leave the video tag alone when the codec is unknown', () => {
      const args = buildRemuxArgs({
        inputPath: '/staged/odd.avi',
        outputPath: '/staged/odd.transcoding.mp4',
        needsAudioReencode: true,
        includeSubtitles: false,
      });

      expect(args).toEqual([
        '-hide_banner', '-loglevel', 'error', '-stats',
        '-i', '/staged/odd.avi', '-map', '0',
        '-c:v', 'copy',
        '-c:a', 'aac', '-b:a', '192k',
        '-sn',
        '-movflags', '+faststart', '-y', '/staged/odd.transcoding.mp4',
      ]);
    });
  });

  // ============================================================================
  // DETECTION
  // ============================================================================

  describe('detectHardwareProfile', () => {
    it('should prefer NVENC on Linux', async () => {
      mockRunCommand.mockResolvedValue({ code: 0, stdout: encoderList('hevc_qsv', 'hevc_nvenc'), stderr: '' });

      expect(await detectHardwareProfile('ffmpeg', 'linux')).toBe('nvidia');
      expect(mockRunCommand).toHaveBeenCalledWith('ffmpeg', ['-hide_banner', '-encoders']);
    });

    it('should prefer VideoToolbox on macOS', async () => {
      mockRunCommand.mockResolvedValue({
        code: 0,
        stdout: encoderList('hevc_nvenc', 'hevc_videotoolbox'),
        stderr: '',
      });

      expect(await detectHardwareProfile('ffmpeg', 'darwin')).toBe('videotoolbox');
    });

    it('should fall back to software without a hardware encoder', async () => {
      mockRunCommand.mockResolvedValue({ code: 0, stdout: encoderList('libx265'), stderr: '' });

      expect(await detectHardwareProfile('ffmpeg', 'linux')).toBe('software');
    });

    it('should fall back to software when ffmpeg cannot be run', async () => {
      mockRunCommand.mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

      expect(await detectHardwareProfile('ffmpeg', 'linux')).toBe('software');
    });
  });

  describe('resolveEncodingProfile', () => {
    it('should detect the encoder for auto', async () => {
      mockRunCommand.mockResolvedValue({ code: 0, stdout: encoderList('hevc_qsv'), stderr: '' });

      const profile = await resolveEncodingProfile({ ...DEFAULT_CONFIG, encoder: 'auto' });

      expect(profile.encoder).toBe('hevc_qsv');
    });

    it('should use a forced profile without probing', async () => {
      const profile = await resolveEncodingProfile({ ...DEFAULT_CONFIG, encoder: 'software' });

      expect(profile.encoder).toBe('libx265');
      expect(mockRunCommand).not.toHaveBeenCalled();
    });

    it('should pass any other encoder name through', async () => {
      const profile = await resolveEncodingProfile({ ...DEFAULT_CONFIG, encoder: 'hevc_amf' });

      expect(profile.encoder).toBe('hevc_amf');
      expect(profile.videoArgs(selectEncodingTier(FULL_HD))).toEqual([
        '-b:v', '7000k', '-maxrate', '9000k', '-bufsize', '14000k', '-profile:v', 'main', '-pix_fmt', 'yuv420p',
      ]);
    });
  });
});
