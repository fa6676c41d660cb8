/**
 * Filename Parser Unit Tests
 *
 * Tests for token extraction, title guessing and media identification
 * from noisy release filenames.
 */

import { describe, it, expect } from 'vitest';
import {
  cleanSearchTitle,
  extractEpisodeTitleFromFilename,
  extractFallbackTitle,
  guessTitleAndYear,
  hasExternalIdTag,
  identifyMedia,
  normalizeText,
  parseDate,
  parseSeasonEpisode,
  sanitizeFilename,
} from '../../src/rename/parser.js';

describe('parser', () => {
  // ============================================================================
  // TEXT HELPERS
  // ============================================================================

  describe('normalizeText', () => {
    it('should replace dots and underscores and collapse whitespace', () => {
      expect(normalizeText('Movie.Title_2020   extra ')).toBe('Movie Title 2020 extra');
    });
  });

  describe('sanitizeFilename', () => {
    it('should strip characters that are invalid in file names', () => {
      expect(sanitizeFilename('Face/Off: Redux?')).toBe('FaceOff Redux');
    });
  });

  // ============================================================================
  // TOKENS
  // ============================================================================

  describe('parseSeasonEpisode', () => {
    it('should parse upper and lower case tokens', () => {
      expect(parseSeasonEpisode('Show.S01E02.720p')).toEqual({ season: 1, episode: 2 });
      expect(parseSeasonEpisode('show s3e7')).toEqual({ season: 3, episode: 7 });
    });

    it('should return undefined without a token', () => {
      expect(parseSeasonEpisode('Inception 2010')).toBeUndefined();
    });

    it('should take only the first pair of a multi-episode token', () => {
      expect(parseSeasonEpisode('Show.S01E01E02')).toEqual({ season: 1, episode: 1 });
    });
  });

  describe('parseDate', () => {
    it('should normalize separators to YYYY-MM-DD', () => {
      expect(parseDate('Daily.Show.2024.03.15.720p')).toEqual({ date: '2024-03-15', year: '2024' });
      expect(parseDate('Daily_Show_2023_12_01')).toEqual({ date: '2023-12-01', year: '2023' });
    });

    it('should reject impossible months', () => {
      expect(parseDate('Show 2024-13-01')).toBeUndefined();
    });
  });

  describe('hasExternalIdTag', () => {
    it('should detect a tmdb tag', () => {
      expect(hasExternalIdTag('Inception (2010) {tmdb-27205}.mkv')).toBe(true);
      expect(hasExternalIdTag('Inception (2010).mkv')).toBe(false);
    });
  });

  // ============================================================================
  // TITLES
  // ============================================================================

  describe('guessTitleAndYear', () => {
    it('should split a dotted release name at the year', () => {
      expect(guessTitleAndYear('Movie.Title.2024.2160p.WEB-DL')).toEqual({ title: 'Movie Title', year: '2024' });
    });

    it('should prefer a parenthesized year', () => {
      expect(guessTitleAndYear('Chernobyl Diaries (2012)')).toEqual({ title: 'Chernobyl Diaries', year: '2012' });
    });

    it('should title-case an all upper case title', () => {
      expect(guessTitleAndYear('THE BIG SHOW 1999')).toEqual({ title: 'The Big Show', year: '1999' });
    });

    it('should strip release tags when there is no year', () => {
      expect(guessTitleAndYear('Movie Title 1080p')).toEqual({ title: 'Movie Title', year: undefined });
    });
  });

  describe('extractFallbackTitle', () => {
    it('should take everything before the first four-digit number', () => {
      expect(extractFallbackTitle('Some.Film.1999.720p')).toBe('Some Film');
      expect(extractFallbackTitle('X.2020')).toBe('X');
    });

    it('should normalize the whole stem when there is no number', () => {
      expect(extractFallbackTitle('just_a_name')).toBe('just a name');
    });
  });

  describe('extractEpisodeTitleFromFilename', () => {
    it('should take the text after the episode token', () => {
      expect(extractEpisodeTitleFromFilename('Intervention - s08e11 - Marquel')).toBe('Marquel');
    });

    it('should return undefined when only the token follows the dash', () => {
      expect(extractEpisodeTitleFromFilename('Show - S01E02')).toBeUndefined();
      expect(extractEpisodeTitleFromFilename('Breaking.Bad.S01E01.720p')).toBeUndefined();
    });
  });

  describe('cleanSearchTitle', () => {
    it('should cut at the episode token', () => {
      expect(cleanSearchTitle('The.Office.S02E03.720p')).toBe('The Office');
    });

    it('should cut at the first dash and drop a parenthesized year', () => {
      expect(cleanSearchTitle('Doctor Who (2005) - s01e01 - Rose')).toBe('Doctor Who');
    });

    it('should remove the date token', () => {
      expect(cleanSearchTitle('Late.Show.2024.03.15', '2024-03-15')).toBe('Late Show');
    });
  });

  // ============================================================================
  // IDENTITY
  // ============================================================================

  describe('identifyMedia', () => {
    it('should identify a numbered episode', () => {
      expect(identifyMedia('Breaking.Bad.S01E01.Pilot')).toEqual({
        kind: 'tv',
        rawStem: 'Breaking.Bad.S01E01.Pilot',
        searchTitle: 'Breaking Bad',
        season: 1,
        episode: 1,
        airDate: undefined,
        airYear: undefined,
        guessedTitle: 'Breaking Bad',
        guessedYear: undefined,
      });
    });

    it('should identify a dated episode', () => {
      const identity = identifyMedia('Late.Show.2024.03.15');
      expect(identity.kind).toBe('tv');
      expect(identity.airDate).toBe('2024-03-15');
      expect(identity.airYear).toBe('2024');
      expect(identity.searchTitle).toBe('Late Show');
      expect(identity.season).toBeUndefined();
    });

    it('should let a season/episode token win over a date', () => {
      const identity = identifyMedia('Show.2024.01.02.S01E05');
      expect(identity.season).toBe(1);
      expect(identity.episode).toBe(5);
      expect(identity.airDate).toBeUndefined();
    });

    it('should identify a movie without season, episode or date', () => {
      expect(identifyMedia('Inception.2010.1080p.BluRay')).toEqual({
        kind: 'movie',
        rawStem: 'Inception.2010.1080p.BluRay',
        searchTitle: 'Inception',
        guessedTitle: 'Inception',
        guessedYear: '2010',
      });
    });
  });
});
