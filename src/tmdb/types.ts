/**
 * TMDB API response types
 * Only the fields the renamer reads are declared; responses are validated at runtime
 */

import { z } from 'zod';

/** TMDB movie in search responses */
export const TMDBMovieListItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  release_date: z.string().nullish(),
});

/** TMDB TV show in search responses */
export const TMDBTVShowListItemSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  first_air_date: z.string().nullish(),
});

/** Paginated search response */
export function paginatedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    page: z.number().int().optional(),
    results: z.array(item),
    total_results: z.number().int().optional(),
  });
}

export const TMDBMovieSearchSchema = paginatedSchema(TMDBMovieListItemSchema);
export const TMDBTVSearchSchema = paginatedSchema(TMDBTVShowListItemSchema);

/** TMDB TV show details response */
export const TMDBTVShowDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  first_air_date: z.string().nullish(),
  last_air_date: z.string().nullish(),
  /** "Returning Series", "Ended", "Canceled", "In Production", "Planned", "Pilot" */
  status: z.string().nullish(),
});

/** TMDB episode details response */
export const TMDBEpisodeDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  season_number: z.number().int().optional(),
  episode_number: z.number().int().optional(),
  air_date: z.string().nullish(),
});
