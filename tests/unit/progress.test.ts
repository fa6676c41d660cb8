/**
 * Progress Monitor Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { parseProgress, ProgressMonitor } from '../../src/transcode/progress.js';

const STATS_LINE = 'frame= 1200 fps= 48 q=28.0 size=   10240kB time=00:00:50.00 bitrate=1677.7kbits/s speed=2.00x';

describe('progress', () => {
  describe('parseProgress', () => {
    it('should read time and speed', () => {
      expect(parseProgress(STATS_LINE)).toEqual({ timeSeconds: 50, speed: 2 });
    });

    it('should take the last sample in a chunk', () => {
      const chunk = 'time=00:00:10.00 speed=1.00x\rtime=01:02:03.50 speed=1.50x';
      expect(parseProgress(chunk)).toEqual({ timeSeconds: 3723.5, speed: 1.5 });
    });

    it('should leave speed undefined before ffmpeg reports it', () => {
      expect(parseProgress('time=00:00:01.00 bitrate=N/A speed=N/A')).toEqual({ timeSeconds: 1, speed: undefined });
    });

    it('should ignore lines without a time token', () => {
      expect(parseProgress('Input #0, matroska,webm, from in.mkv:')).toBeUndefined();
    });
  });

  describe('ProgressMonitor', () => {
    it('should report at most once per interval', () => {
      let now = 0;
      const reports: string[] = [];
      const monitor = new ProgressMonitor({
        label: 'in.mkv',
        intervalSeconds: 60,
        report: (message) => reports.push(message),
        now: () => now,
      });

      now = 30_000;
      monitor.push(`${STATS_LINE}\r`);
      expect(reports).toHaveLength(0);

      now = 61_000;
      monitor.push(`${STATS_LINE}\r`);
      now = 90_000;
      monitor.push(`${STATS_LINE}\r`);

      expect(monitor.reportCount).toBe(1);
      expect(reports).toEqual(['in.mkv: 00:00:50, speed 2.00x']);
    });

    it('should hold a partial line until the rest arrives', () => {
      const monitor = new ProgressMonitor({ label: 'in.mkv', intervalSeconds: 60, report: () => undefined, now: () => 0 });

      monitor.push('frame= 10 time=00:00');
      expect(monitor.sample).toBeUndefined();

      monitor.push(':05.00 speed=1.00x\r');
      expect(monitor.sample).toEqual({ timeSeconds: 5, speed: 1 });
    });

    it('should include percentage and ETA when the duration is known', () => {
      const monitor = new ProgressMonitor({
        label: 'in.mkv',
        durationSeconds: 200,
        intervalSeconds: 60,
        report: () => undefined,
        now: () => Date.UTC(2024, 2, 15, 10, 0, 0),
      });

      expect(monitor.describe({ timeSeconds: 50, speed: 2 })).toBe(
        'in.mkv: 00:00:50 / 00:03:20 (25.0%), speed 2.00x, ETA 2024-03-15 10:01:15 (1m 15s)',
      );
    });
  });
});
