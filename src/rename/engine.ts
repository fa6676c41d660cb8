/**
 * Renaming engine for reelsort
 * Combines filename parsing, provider lookups and the path formatter into a RenameOutcome
 */

import { basename, dirname, extname } from 'node:path';
import { CONTENT_TYPE_MOVIES, CONTENT_TYPE_TV, MIN_TITLE_LENGTH } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import type {
  ContentType,
  EpisodeHint,
  Lookup,
  MediaIdentity,
  MetadataResolver,
  RenameOutcome,
} from '../types.js';
import {
  buildDatedTvFilename,
  buildFolderName,
  buildMovieFilename,
  buildTvFilename,
  formatEpisodeToken,
  formatSeasonFolder,
} from './formatter.js';
import {
  cleanSearchTitle,
  extractEpisodeTitleFromFilename,
  extractFallbackTitle,
  guessTitleAndYear,
  hasExternalIdTag,
  identifyMedia,
  normalizeText,
  sanitizeFilename,
} from './parser.js';

const logger = getLogger().child('rename');

function splitName(filePath: string): { fileName: string; stem: string; extension: string } {
  const fileName = basename(filePath);
  const extension = extname(fileName);
  return { fileName, stem: basename(fileName, extension), extension };
}

function isUsableTitle(title: string | undefined): title is string {
  return title !== undefined && title.trim().length >= MIN_TITLE_LENGTH;
}

function notRenamable(fileName: string): RenameOutcome {
  return { destinationRelativePath: fileName, matchedExternally: false, isRenamable: false };
}

function logLookupMiss(kind: string, searchTitle: string, lookup: Lookup<unknown>): void {
  if (lookup.status === 'error') {
    logger.debug(`${kind} lookup failed for "${searchTitle}": ${lookup.reason}`);
  } else if (lookup.status === 'not-found') {
    logger.info(`No ${kind} match for "${searchTitle}", using filename`);
  }
}

/**
 * A file whose name already carries a {tmdb-<id>} tag is kept where it is
 * relative to its parent folder
 */
function alreadyOrganized(filePath: string): RenameOutcome {
  const parent = basename(dirname(filePath));
  const fileName = basename(filePath);
  return {
    destinationRelativePath: parent ? `${parent}/${fileName}` : fileName,
    matchedExternally: true,
    isRenamable: true,
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// MOVIES
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a movie file
 * Matched:   "Title (Year) {tmdb-id}/Title (Year) {tmdb-id}.ext"
 * Unmatched: "Title (Year)/Title (Year).ext" from the filename alone
 */
export async function resolveMovie(resolver: MetadataResolver, filePath: string): Promise<RenameOutcome> {
  const { fileName, stem, extension } = splitName(filePath);
  if (hasExternalIdTag(fileName)) {
    return alreadyOrganized(filePath);
  }

  const guess = guessTitleAndYear(stem);
  const searchTitle = guess.title || normalizeText(stem);
  logger.debug(`Movie lookup: "${searchTitle}" (year: ${guess.year ?? 'unknown'}) for ${fileName}`);

  const lookup = await resolver.searchMovie(searchTitle, guess.year);
  if (lookup.status === 'found') {
    const { externalId, yearOrRange } = lookup.value;
    const title = sanitizeFilename(lookup.value.canonicalTitle);
    logger.debug(`Matched "${title}" (${yearOrRange}) tmdb-${externalId}`);
    return {
      destinationRelativePath: `${buildFolderName(title, yearOrRange, externalId)}/${buildMovieFilename(
        title,
        yearOrRange,
        externalId,
        extension,
      )}`,
      matchedExternally: true,
      isRenamable: true,
    };
  }
  logLookupMiss('movie', searchTitle, lookup);

  let title = guess.title;
  if (!isUsableTitle(title)) {
    title = extractFallbackTitle(stem);
  }
  if (!isUsableTitle(title)) {
    return notRenamable(fileName);
  }

  return {
    destinationRelativePath: `${buildFolderName(title, guess.year)}/${buildMovieFilename(
      title,
      guess.year,
      undefined,
      extension,
    )}`,
    matchedExternally: false,
    isRenamable: true,
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// TV EPISODES
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Episode title priority: filename, then provider, then the bare token
 */
async function resolveEpisodeTitle(
  resolver: MetadataResolver,
  stem: string,
  externalId: number,
  season: number,
  episode: number,
): Promise<string> {
  const fromFilename = extractEpisodeTitleFromFilename(stem);
  if (fromFilename) {
    logger.debug(`Episode title "${fromFilename}" taken from filename`);
    return fromFilename;
  }

  const lookup = await resolver.getEpisodeTitle(externalId, season, episode);
  if (lookup.status === 'found') {
    const title = sanitizeFilename(lookup.value);
    if (title) {
      logger.debug(`Episode title "${title}" taken from TMDB`);
      return title;
    }
  } else {
    logLookupMiss('episode', `${externalId} ${formatEpisodeToken(season, episode)}`, lookup);
  }

  return formatEpisodeToken(season, episode);
}

/**
 * Resolve a TV episode, numbered (season/episode) or date-based
 * Numbered: "Series (Year) {tmdb-id}/Season 01/Series - s01e02 - Title.ext"
 * Dated:    "Series (Year) {tmdb-id}/Season 2024/Series - 2024-03-15.ext"
 */
export async function resolveTVEpisode(
  resolver: MetadataResolver,
  filePath: string,
  hint: EpisodeHint,
): Promise<RenameOutcome> {
  const { fileName, stem, extension } = splitName(filePath);
  if (hasExternalIdTag(fileName)) {
    return alreadyOrganized(filePath);
  }

  const { season, episode, date, dateYear } = hint;
  const numbered = season !== undefined && episode !== undefined;
  if (!numbered && !date) {
    return notRenamable(fileName);
  }

  const searchTitle = cleanSearchTitle(stem, date);
  logger.debug(
    `Series lookup: "${searchTitle}" for ${fileName} (${numbered ? formatEpisodeToken(season, episode) : date})`,
  );

  const lookup = await resolver.searchSeries(searchTitle);
  if (lookup.status === 'found') {
    const { externalId, yearOrRange } = lookup.value;
    const title = sanitizeFilename(lookup.value.canonicalTitle);
    logger.debug(`Matched "${title}" (${yearOrRange}) tmdb-${externalId}`);

    if (numbered) {
      const episodeTitle = await resolveEpisodeTitle(resolver, stem, externalId, season, episode);
      const folder = buildFolderName(title, yearOrRange, externalId);
      return {
        destinationRelativePath: `${folder}/${formatSeasonFolder(season)}/${buildTvFilename(
          title,
          season,
          episode,
          episodeTitle,
          extension,
        )}`,
        matchedExternally: true,
        isRenamable: true,
      };
    }
    if (date) {
      const folder = buildFolderName(title, dateYear ?? yearOrRange, externalId);
      return {
        destinationRelativePath: `${folder}/${formatSeasonFolder(dateYear ?? '01')}/${buildDatedTvFilename(
          title,
          date,
          extension,
        )}`,
        matchedExternally: true,
        isRenamable: true,
      };
    }
  }
  logLookupMiss('series', searchTitle, lookup);

  const guess = guessTitleAndYear(searchTitle);
  if (!isUsableTitle(guess.title)) {
    return notRenamable(fileName);
  }

  if (numbered) {
    return {
      destinationRelativePath: `${buildFolderName(guess.title, guess.year)}/${formatSeasonFolder(
        season,
      )}/${buildTvFilename(guess.title, season, episode, undefined, extension)}`,
      matchedExternally: false,
      isRenamable: true,
    };
  }
  if (date) {
    const folder = buildFolderName(guess.title, guess.year ?? dateYear);
    return {
      destinationRelativePath: `${folder}/${formatSeasonFolder(dateYear ?? '01')}/${buildDatedTvFilename(
        guess.title,
        date,
        extension,
      )}`,
      matchedExternally: false,
      isRenamable: true,
    };
  }

  return notRenamable(fileName);
}

//═══════════════════════════════════════════════════════════════════════════════
// DISPATCH
//═══════════════════════════════════════════════════════════════════════════════

export interface ResolvedFile {
  identity: MediaIdentity;
  contentType: ContentType;
  outcome: RenameOutcome;
}

/** Identify a file from its name and resolve it as a movie or TV episode */
export async function resolveFile(resolver: MetadataResolver, filePath: string): Promise<ResolvedFile> {
  const { stem } = splitName(filePath);
  const identity = identifyMedia(stem);

  if (identity.kind === 'tv') {
    const outcome = await resolveTVEpisode(resolver, filePath, {
      season: identity.season,
      episode: identity.episode,
      date: identity.airDate,
      dateYear: identity.airYear,
    });
    return { identity, contentType: CONTENT_TYPE_TV, outcome };
  }

  const outcome = await resolveMovie(resolver, filePath);
  return { identity, contentType: CONTENT_TYPE_MOVIES, outcome };
}
