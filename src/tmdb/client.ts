/**
 * TMDB API Client
 * Movie/series search and episode lookups behind the MetadataResolver interface
 */

import type { z } from 'zod';
import { StartupError } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { Lookup, MetadataResolver, ResolvedMetadata } from '../types.js';
import {
  TMDBEpisodeDetailsSchema,
  TMDBMovieSearchSchema,
  TMDBTVSearchSchema,
  TMDBTVShowDetailsSchema,
} from './types.js';

const logger = getLogger().child('tmdb');

const TMDB_BASE_URL = 'https://api.themoviedb.org/3';

/** Series statuses rendered as an open year range */
const ONGOING_STATUSES: ReadonlySet<string> = new Set(['Returning Series', 'In Production', 'Planned']);

//═══════════════════════════════════════════════════════════════════════════════
// CACHE
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Lookup cache holding in-flight and settled lookups.
 * Storing the promise lets concurrent identical requests share one round trip.
 */
export interface LookupCache<T> {
  get(key: string): Promise<Lookup<T>> | undefined;
  set(key: string, value: Promise<Lookup<T>>): void;
  delete(key: string): void;
}

/** Process-lifetime in-memory cache */
export class MemoryLookupCache<T> implements LookupCache<T> {
  private entries = new Map<string, Promise<Lookup<T>>>();

  get(key: string): Promise<Lookup<T>> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: Promise<Lookup<T>>): void {
    this.entries.set(key, value);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// YEAR RANGE
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Year representation for a series
 *   ongoing or no end date -> "2010-"
 *   same start and end     -> "2010"
 *   otherwise              -> "2010-2015"
 */
export function computeYearRange(
  firstAirDate?: string | null,
  lastAirDate?: string | null,
  status?: string | null,
): string {
  const startYear = firstAirDate ? firstAirDate.slice(0, 4) : undefined;
  const endYear = lastAirDate ? lastAirDate.slice(0, 4) : undefined;

  if (!startYear) return 'Unknown';
  if ((status && ONGOING_STATUSES.has(status)) || !endYear) return `${startYear}-`;
  if (startYear === endYear) return startYear;
  return `${startYear}-${endYear}`;
}

//═══════════════════════════════════════════════════════════════════════════════
// CLIENT
//═══════════════════════════════════════════════════════════════════════════════

/** TMDB client configuration */
export interface TMDBClientConfig {
  apiKey?: string;
  readAccessToken?: string;
  language?: string;
  /** Per-request timeout, default 10s */
  timeoutMs?: number;
  baseUrl?: string;
  titleCache?: LookupCache<ResolvedMetadata>;
  episodeCache?: LookupCache<string>;
}

/** TMDB API Client */
export class TMDBClient implements MetadataResolver {
  private apiKey?: string;
  private readAccessToken?: string;
  private language: string;
  private timeoutMs: number;
  private baseUrl: string;
  private titleCache: LookupCache<ResolvedMetadata>;
  private episodeCache: LookupCache<string>;

  constructor(config: TMDBClientConfig) {
    if (!config.apiKey && !config.readAccessToken) {
      throw new StartupError(
        'missingCredential',
        'TMDB credentials missing: set TMDB_API_KEY or TMDB_READ_ACCESS_TOKEN',
      );
    }
    this.apiKey = config.apiKey;
    this.readAccessToken = config.readAccessToken;
    this.language = config.language ?? 'en-US';
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.baseUrl = config.baseUrl ?? TMDB_BASE_URL;
    this.titleCache = config.titleCache ?? new MemoryLookupCache<ResolvedMetadata>();
    this.episodeCache = config.episodeCache ?? new MemoryLookupCache<string>();
  }

  //═══════════════════════════════════════════════════════════════════════════
  // HTTP HELPERS
  //═══════════════════════════════════════════════════════════════════════════

  /**
   * GET an endpoint and validate the body
   * Timeouts, non-200 responses, network failures and unexpected bodies all become 'error'
   */
  private async request<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: S,
  ): Promise<Lookup<z.infer<S>>> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    if (this.apiKey) url.searchParams.set('api_key', this.apiKey);
    url.searchParams.set('language', this.language);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let body: unknown;
    try {
      const response = await fetch(url.toString(), {
        headers: this.readAccessToken ? { Authorization: `Bearer ${this.readAccessToken}` } : {},
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (response.status !== 200) {
        logger.debug(`${endpoint} returned HTTP ${response.status}`);
        return { status: 'error', reason: `HTTP ${response.status}` };
      }
      body = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`${endpoint} failed: ${reason}`);
      return { status: 'error', reason };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.debug(`${endpoint} returned an unexpected body: ${parsed.error.message}`);
      return { status: 'error', reason: 'malformed response' };
    }
    return { status: 'found', value: parsed.data };
  }

  /** Share in-flight lookups and keep definite answers; drop transient errors */
  private cached<T>(cache: LookupCache<T>, key: string, load: () => Promise<Lookup<T>>): Promise<Lookup<T>> {
    const existing = cache.get(key);
    if (existing) return existing;

    const pending = load().then((result) => {
      if (result.status === 'error') {
        cache.delete(key);
      }
      return result;
    });
    cache.set(key, pending);
    return pending;
  }

  //═══════════════════════════════════════════════════════════════════════════
  // SEARCH
  //═══════════════════════════════════════════════════════════════════════════

  /** Search for a movie; the top-ranked result is trusted */
  searchMovie(title: string, year?: string): Promise<Lookup<ResolvedMetadata>> {
    return this.cached(this.titleCache, `movie:${title}:${year ?? ''}`, async () => {
      const params: Record<string, string> = { query: title, include_adult: 'false' };
      if (year) params.year = year;

      const search = await this.request('/search/movie', params, TMDBMovieSearchSchema);
      if (search.status !== 'found') return search;

      const movie = search.value.results[0];
      if (!movie) return { status: 'not-found' };

      return {
        status: 'found',
        value: {
          externalId: movie.id,
          canonicalTitle: movie.title,
          yearOrRange: movie.release_date ? movie.release_date.slice(0, 4) : 'Unknown',
        },
      };
    });
  }

  /**
   * Search for a series, then fetch its details for an accurate year range.
   * If the details request fails the first-air year from the search is used.
   */
  searchSeries(title: string, year?: string): Promise<Lookup<ResolvedMetadata>> {
    return this.cached(this.titleCache, `tv:${title}:${year ?? ''}`, async () => {
      const params: Record<string, string> = { query: title, include_adult: 'false' };
      if (year) params.first_air_date_year = year;

      const search = await this.request('/search/tv', params, TMDBTVSearchSchema);
      if (search.status !== 'found') return search;

      const show = search.value.results[0];
      if (!show) return { status: 'not-found' };

      const details = await this.request(`/tv/${show.id}`, {}, TMDBTVShowDetailsSchema);
      if (details.status === 'found') {
        const { name, first_air_date, last_air_date, status } = details.value;
        return {
          status: 'found',
          value: {
            externalId: show.id,
            canonicalTitle: name,
            yearOrRange: computeYearRange(first_air_date, last_air_date, status),
          },
        };
      }

      return {
        status: 'found',
        value: {
          externalId: show.id,
          canonicalTitle: show.name,
          yearOrRange: show.first_air_date ? show.first_air_date.slice(0, 4) : 'Unknown',
        },
      };
    });
  }

  /** Episode name for a series episode */
  getEpisodeTitle(externalId: number, season: number, episode: number): Promise<Lookup<string>> {
    return this.cached(this.episodeCache, `episode:${externalId}:${season}:${episode}`, async () => {
      const details = await this.request(
        `/tv/${externalId}/season/${season}/episode/${episode}`,
        {},
        TMDBEpisodeDetailsSchema,
      );
      if (details.status !== 'found') return details;

      const name = details.value.name?.trim();
      return name ? { status: 'found', value: name } : { status: 'not-found' };
    });
  }
}
