/**
 * Encode progress monitoring for reelsort
 * Scans ffmpeg's -stats output for time= and speed= tokens and reports at a fixed interval
 */

import { etaSingleFile, formatEta, formatRuntime } from '../shared/format.js';

const TIME_PATTERN = /time=\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/g;
const SPEED_PATTERN = /speed=\s*(\d+(?:\.\d+)?)x/g;

/** Latest position reported by the encoder */
export interface ProgressSample {
  /** Encoded media time in seconds */
  timeSeconds: number;
  /** Multiple of realtime; absent until ffmpeg prints one */
  speed?: number;
}

function lastMatch(pattern: RegExp, text: string): RegExpMatchArray | undefined {
  let last: RegExpMatchArray | undefined;
  for (const match of text.matchAll(pattern)) {
    last = match;
  }
  return last;
}

/**
 * Parse the most recent progress sample in a chunk of encoder output
 * Returns undefined when the chunk carries no time= token
 */
export function parseProgress(text: string): ProgressSample | undefined {
  const time = lastMatch(TIME_PATTERN, text);
  if (!time) return undefined;

  const timeSeconds = Number(time[1]) * 3600 + Number(time[2]) * 60 + Number.parseFloat(time[3] ?? '0');
  const speedMatch = lastMatch(SPEED_PATTERN, text);
  const speed = speedMatch ? Number.parseFloat(speedMatch[1] ?? '') : undefined;

  return {
    timeSeconds,
    speed: speed !== undefined && Number.isFinite(speed) ? speed : undefined,
  };
}

export interface ProgressMonitorOptions {
  /** Shown at the start of every report, usually the file name */
  label: string;
  /** Media duration in seconds, when the prober knew it */
  durationSeconds?: number;
  /** Minimum seconds between two reports */
  intervalSeconds: number;
  report: (message: string) => void;
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * Throttled progress reporter for one encode
 * ffmpeg separates -stats updates with carriage returns, so chunks are split on \r and \n
 * and a trailing partial line is held until the next chunk.
 */
export class ProgressMonitor {
  private readonly options: ProgressMonitorOptions;
  private readonly now: () => number;
  private pending = '';
  private lastReportAt: number;
  private latest: ProgressSample | undefined;
  private reports = 0;

  constructor(options: ProgressMonitorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.lastReportAt = this.now();
  }

  /** Feed a chunk of stderr */
  push(chunk: string): void {
    const lines = (this.pending + chunk).split(/[\r\n]/);
    this.pending = lines.pop() ?? '';

    for (const line of lines) {
      const sample = parseProgress(line);
      if (sample) {
        this.latest = sample;
      }
    }

    if (this.latest && this.now() - this.lastReportAt >= this.options.intervalSeconds * 1000) {
      this.options.report(this.describe(this.latest));
      this.lastReportAt = this.now();
      this.reports++;
    }
  }

  /** Most recent sample, if any */
  get sample(): ProgressSample | undefined {
    return this.latest;
  }

  /** Number of reports emitted so far */
  get reportCount(): number {
    return this.reports;
  }

  describe(sample: ProgressSample): string {
    const { label, durationSeconds } = this.options;
    const parts = [`${label}: ${formatRuntime(sample.timeSeconds)}`];

    if (durationSeconds && durationSeconds > 0) {
      const percent = Math.min(100, (sample.timeSeconds / durationSeconds) * 100);
      parts[0] += ` / ${formatRuntime(durationSeconds)} (${percent.toFixed(1)}%)`;
    }
    if (sample.speed !== undefined) {
      parts.push(`speed ${sample.speed.toFixed(2)}x`);
      if (durationSeconds && durationSeconds > 0 && sample.speed > 0) {
        const remaining = etaSingleFile(durationSeconds, sample.speed, sample.timeSeconds);
        parts.push(`ETA ${formatEta(remaining, new Date(this.now()))}`);
      }
    }

    return parts.join(', ');
  }
}
