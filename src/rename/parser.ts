/**
 * Filename parser for reelsort
 * Turns noisy release filenames into a structured media identity
 */

import {
  DATE_PATTERN,
  EXTERNAL_ID_TAG_PATTERN,
  INVALID_FILENAME_CHARS,
  RELEASE_TAG_PATTERN,
  SEASON_EPISODE_PATTERN,
} from '../shared/constants.js';
import type { MediaIdentity } from '../types.js';

export interface SeasonEpisode {
  season: number;
  episode: number;
}

export interface AirDate {
  /** YYYY-MM-DD */
  date: string;
  year: string;
}

export interface TitleGuess {
  title: string;
  year?: string;
}

//═══════════════════════════════════════════════════════════════════════════════
// TEXT HELPERS
//═══════════════════════════════════════════════════════════════════════════════

/** Replace '_' and '.' with spaces, collapse whitespace, trim */
export function normalizeText(text: string): string {
  return text.replace(/[_.]/g, ' ').replace(/\s+/g, ' ').trim();
}

/** Remove characters that are invalid in file names */
export function sanitizeFilename(name: string): string {
  return name.replace(INVALID_FILENAME_CHARS, '').trim();
}

/** Trim any of the given characters from both ends */
function trimChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}

function isAllUpperCase(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

/** "THE BIG SHOW" -> "The Big Show"; every run of letters is capitalized */
function toTitleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

//═══════════════════════════════════════════════════════════════════════════════
// TOKENS
//═══════════════════════════════════════════════════════════════════════════════

/**
 * First S<nn>E<nn> token anywhere in the stem.
 * Multi-episode tokens (S01E01E02) yield only the first pair.
 */
export function parseSeasonEpisode(stem: string): SeasonEpisode | undefined {
  const match = SEASON_EPISODE_PATTERN.exec(stem);
  if (!match) return undefined;
  return { season: Number(match[1]), episode: Number(match[2]) };
}

/** Broadcast date token, normalized to YYYY-MM-DD */
export function parseDate(stem: string): AirDate | undefined {
  const match = DATE_PATTERN.exec(stem);
  if (!match) return undefined;
  const [, year, month, day] = match;
  return { date: `${year}-${month}-${day}`, year };
}

/** True when the name already carries a {tmdb-<id>} tag */
export function hasExternalIdTag(name: string): boolean {
  return EXTERNAL_ID_TAG_PATTERN.test(name);
}

//═══════════════════════════════════════════════════════════════════════════════
// TITLES
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Best-effort title and year from a noisy stem
 *   "Movie.Title.2024.2160p.WEB-DL" -> { title: "Movie Title", year: "2024" }
 *   "Chernobyl Diaries (2012)"      -> { title: "Chernobyl Diaries", year: "2012" }
 */
export function guessTitleAndYear(stem: string): TitleGuess {
  const text = normalizeText(stem);
  let year: string | undefined;
  let titlePart = text;

  const parenthesized = /\(((?:19|20)\d{2})\)/.exec(text);
  if (parenthesized) {
    year = parenthesized[1];
    titlePart = text.slice(0, parenthesized.index).trim();
  } else {
    const bareYears = [...text.matchAll(/(?:19|20)\d{2}/g)];
    const last = bareYears.at(-1);
    if (last?.index !== undefined) {
      year = last[0];
      titlePart = text.slice(0, last.index).trim();
    }
  }

  titlePart = titlePart.replace(RELEASE_TAG_PATTERN, '');
  titlePart = trimChars(titlePart.replace(/\s+/g, ' '), ' -_()');
  if (isAllUpperCase(titlePart)) {
    titlePart = toTitleCase(titlePart);
  }

  return { title: titlePart.trim(), year };
}

/**
 * Secondary title extraction: everything before the first 4-digit number,
 * with or without parentheses
 */
export function extractFallbackTitle(stem: string): string {
  const match = /^(.+?)\s*\(?\d{4}\)?/.exec(stem);
  return normalizeText(match ? match[1] : stem);
}

/**
 * Human episode title embedded in a filename
 *   "Intervention - s08e11 - Marquel" -> "Marquel"
 * Falls back to the last " - " segment unless that segment is itself a token.
 */
export function extractEpisodeTitleFromFilename(stem: string): string | undefined {
  const text = normalizeText(stem);

  const afterToken = /[Ss]\d{1,2}[Ee]\d{1,2}\s*-\s*(.+)$/.exec(text);
  if (afterToken) {
    const candidate = trimChars(afterToken[1], ' -_');
    if (candidate) return sanitizeFilename(candidate);
  }

  const parts = text
    .split(' - ')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (parts.length >= 2) {
    const candidate = parts[parts.length - 1];
    if (!SEASON_EPISODE_PATTERN.test(candidate)) {
      return sanitizeFilename(candidate);
    }
  }

  return undefined;
}

/**
 * Series search query: cut at the season/episode token and at the first " - ",
 * drop "(YYYY)" and the date token, then normalize
 */
export function cleanSearchTitle(stem: string, date?: string): string {
  let title = stem.split(SEASON_EPISODE_PATTERN)[0];
  title = title.split(' - ')[0];
  title = title.replace(/\(\d{4}\)/g, '');
  if (date) {
    title = title.replace(new RegExp(date.replace(/-/g, '[-_. ]'), 'g'), '');
  }
  return normalizeText(title);
}

//═══════════════════════════════════════════════════════════════════════════════
// IDENTITY
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Build the media identity for a filename stem.
 * A season/episode token wins over a date token; either one makes the file TV.
 */
export function identifyMedia(stem: string): MediaIdentity {
  const seasonEpisode = parseSeasonEpisode(stem);
  const airDate = seasonEpisode ? undefined : parseDate(stem);

  if (seasonEpisode || airDate) {
    const searchTitle = cleanSearchTitle(stem, airDate?.date);
    const guess = guessTitleAndYear(searchTitle);
    return {
      kind: 'tv',
      rawStem: stem,
      searchTitle,
      season: seasonEpisode?.season,
      episode: seasonEpisode?.episode,
      airDate: airDate?.date,
      airYear: airDate?.year,
      guessedTitle: guess.title || undefined,
      guessedYear: guess.year,
    };
  }

  const guess = guessTitleAndYear(stem);
  return {
    kind: 'movie',
    rawStem: stem,
    searchTitle: guess.title || normalizeText(stem),
    guessedTitle: guess.title || undefined,
    guessedYear: guess.year,
  };
}
