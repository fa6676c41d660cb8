/**
 * Path formatter for reelsort
 * The single place where library folder and file names are rendered
 */

import { EXTERNAL_ID_TAG_PREFIX } from '../shared/constants.js';

/** "{tmdb-123}" */
export function formatExternalIdTag(externalId: number): string {
  return `{${EXTERNAL_ID_TAG_PREFIX}-${externalId}}`;
}

/**
 * Library folder name
 *   "Title (Year) {tmdb-123}" when an id is known (year used verbatim, e.g. "2005-")
 *   "Title (Year)" when only a year is known
 *   "Title" otherwise
 */
export function buildFolderName(title: string, year?: string, externalId?: number): string {
  if (externalId !== undefined) {
    return `${title} (${year ?? 'Unknown'}) ${formatExternalIdTag(externalId)}`;
  }
  if (year) {
    return `${title} (${year})`;
  }
  return title;
}

/** "s01e02" */
export function formatEpisodeToken(season: number, episode: number): string {
  return `s${String(season).padStart(2, '0')}e${String(episode).padStart(2, '0')}`;
}

/** "Season 01" */
export function formatSeasonFolder(season: number | string): string {
  return typeof season === 'number' ? `Season ${String(season).padStart(2, '0')}` : `Season ${season}`;
}

/**
 * Episode filename "Series - s01e02 - Title.ext"
 * The title is dropped when it is just the token again.
 */
export function buildTvFilename(
  seriesTitle: string,
  season: number,
  episode: number,
  episodeTitle: string | undefined,
  extension: string,
): string {
  const token = formatEpisodeToken(season, episode);
  const title = episodeTitle?.trim();
  if (!title || title.toLowerCase() === token) {
    return `${seriesTitle} - ${token}${extension}`;
  }
  return `${seriesTitle} - ${token} - ${title}${extension}`;
}

/** Date-based episode filename "Series - 2024-03-15.ext" */
export function buildDatedTvFilename(seriesTitle: string, date: string, extension: string): string {
  return `${seriesTitle} - ${date}${extension}`;
}

/** Movie filename "Title (Year) {tmdb-123}.ext", "Title (Year).ext" or "Title.ext" */
export function buildMovieFilename(
  title: string,
  year: string | undefined,
  externalId: number | undefined,
  extension: string,
): string {
  return `${buildFolderName(title, year, externalId)}${extension}`;
}
