/**
 * Formatting utilities for reelsort
 * Durations, sizes, runtimes and completion estimates used in log output
 */

import { EST_AVG_SPEED, EST_AVG_VIDEO_LENGTH_SECONDS } from './constants.js';

/**
 * Format bytes as human-readable string
 * @returns Formatted string (e.g., "1.50 GB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const value = bytes / Math.pow(1024, exponent);

  return `${value.toFixed(2)} ${units[exponent]}`;
}

/**
 * Format duration in seconds as human-readable string
 * @returns Formatted string (e.g., "1h 30m 45s")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 0) return '0s';

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  }
  return `${secs}s`;
}

/** Wall-clock runtime as HH:MM:SS (hours are not wrapped at 24) */
export function formatRuntime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, minutes, secs].map((n) => String(n).padStart(2, '0')).join(':');
}

/**
 * Format a timestamp for logging
 * @returns ISO-like timestamp string without milliseconds (UTC)
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

//═══════════════════════════════════════════════════════════════════════════════
// COMPLETION ESTIMATES
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Render a remaining-time estimate as "<completion time> (<remaining>)"
 * e.g. "2024-03-15 10:30:00 (1h 30m 0s)"
 */
export function formatEta(remainingSeconds: number, now: Date = new Date()): string {
  const remaining = Math.max(0, remainingSeconds);
  const completion = new Date(now.getTime() + remaining * 1000);
  return `${formatTimestamp(completion)} (${formatDuration(remaining)})`;
}

/** Remaining seconds for a single encode, from media duration, elapsed media time and speed */
export function etaSingleFile(durationSeconds: number, speed: number, elapsedSeconds: number): number {
  if (speed <= 0) return 0;
  return Math.max(0, (durationSeconds - elapsedSeconds) / speed);
}

/** Remaining seconds for the batch, extrapolated from the average time per finished unit */
export function etaTotal(doneCount: number, totalCount: number, elapsedSeconds: number): number {
  if (doneCount <= 0) return 0;
  const avgPerFile = elapsedSeconds / doneCount;
  return Math.max(0, avgPerFile * (totalCount - doneCount));
}

/** Rough up-front estimate before anything has been transcoded */
export function etaFromStart(fileCount: number, workers: number): number {
  if (workers <= 0) return 0;
  return (fileCount * EST_AVG_VIDEO_LENGTH_SECONDS) / (workers * EST_AVG_SPEED);
}
