/**
 * Path Formatter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildDatedTvFilename,
  buildFolderName,
  buildMovieFilename,
  buildTvFilename,
  formatEpisodeToken,
  formatExternalIdTag,
  formatSeasonFolder,
} from '../../src/rename/formatter.js';

describe('formatter', () => {
  describe('buildFolderName', () => {
    it('should include year and tag when the id is known', () => {
      expect(buildFolderName('Inception', '2010', 27205)).toBe('Inception (2010) {tmdb-27205}');
    });

    it('should render an unknown year when only the id is known', () => {
      expect(buildFolderName('Show', undefined, 5)).toBe('Show (Unknown) {tmdb-5}');
    });

    it('should use the year range verbatim', () => {
      expect(buildFolderName('Show', '2005-', 5)).toBe('Show (2005-) {tmdb-5}');
    });

    it('should omit missing parts', () => {
      expect(buildFolderName('Show', '2020')).toBe('Show (2020)');
      expect(buildFolderName('Show')).toBe('Show');
    });
  });

  describe('tokens and folders', () => {
    it('should zero-pad the episode token', () => {
      expect(formatEpisodeToken(1, 2)).toBe('s01e02');
      expect(formatEpisodeToken(10, 100)).toBe('s10e100');
    });

    it('should render season folders for numbers and years', () => {
      expect(formatSeasonFolder(1)).toBe('Season 01');
      expect(formatSeasonFolder('2024')).toBe('Season 2024');
    });

    it('should render the tag', () => {
      expect(formatExternalIdTag(42)).toBe('{tmdb-42}');
    });
  });

  describe('buildTvFilename', () => {
    it('should append the episode title', () => {
      expect(buildTvFilename('Show', 1, 2, 'Pilot', '.mkv')).toBe('Show - s01e02 - Pilot.mkv');
    });

    it('should not repeat the token when the title is the token', () => {
      expect(buildTvFilename('Show', 1, 2, 'S01E02', '.mkv')).toBe('Show - s01e02.mkv');
      expect(buildTvFilename('Show', 1, 2, ' s01e02 ', '.mkv')).toBe('Show - s01e02.mkv');
    });

    it('should drop a missing title', () => {
      expect(buildTvFilename('Show', 1, 2, undefined, '.mp4')).toBe('Show - s01e02.mp4');
    });
  });

  describe('other filenames', () => {
    it('should build dated episode names', () => {
      expect(buildDatedTvFilename('Late Show', '2024-03-15', '.mp4')).toBe('Late Show - 2024-03-15.mp4');
    });

    it('should build movie names matching the folder', () => {
      expect(buildMovieFilename('Inception', '2010', 27205, '.mkv')).toBe('Inception (2010) {tmdb-27205}.mkv');
      expect(buildMovieFilename('Some Film', undefined, undefined, '.avi')).toBe('Some Film.avi');
    });
  });
});
