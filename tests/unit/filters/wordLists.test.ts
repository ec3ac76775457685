import { describe, it, expect } from 'vitest';
import {
  containsWord,
  formatWordList,
  isReleaseAcceptable,
  matchNamesForShow,
  parseWordList,
  releaseRejection,
} from '../../../src/filters/wordLists';

describe('parseWordList', () => {
  it('splits on commas and trims each word', () => {
    expect(parseWordList('word1, word2 ,word3')).toEqual(['word1', 'word2', 'word3']);
  });

  it('returns an empty list for empty input', () => {
    expect(parseWordList('')).toEqual([]);
    expect(parseWordList(null)).toEqual([]);
    expect(parseWordList(undefined)).toEqual([]);
  });

  it('drops empty entries and keeps order', () => {
    expect(parseWordList(' ,b,, a , ')).toEqual(['b', 'a']);
  });

  it('formats back to comma-separated text', () => {
    expect(formatWordList(['b', 'a'])).toBe('b,a');
    expect(formatWordList([])).toBe('');
  });
});

describe('containsWord', () => {
  it('matches whole words case-insensitively', () => {
    expect(containsWord('Show.Name.S01E01.720p.HDTV-GRP', 'hdtv')).toBe(true);
    expect(containsWord('Show_Name_S01E01_German_720p', 'GERMAN')).toBe(true);
  });

  it('does not match inside a longer word', () => {
    expect(containsWord('Show.Name.S01E01.HDTVRip', 'hdtv')).toBe(false);
  });

  it('treats regex characters in the word literally', () => {
    expect(containsWord('Show.Name.S01E01.x.264', 'x.264')).toBe(true);
    expect(containsWord('Show.Name.S01E01.x5264', 'x.264')).toBe(false);
  });
});

describe('release filtering', () => {
  it('rejects a release containing an ignored word', () => {
    const filter = { ignoreWords: ['german', 'dubbed'], requireWords: [] };
    expect(releaseRejection('Show.S01E01.German.720p', filter)).toEqual({ reason: 'ignored-word', word: 'german' });
    expect(isReleaseAcceptable('Show.S01E01.German.720p', filter)).toBe(false);
  });

  it('rejects a release matching none of the required words', () => {
    const filter = { ignoreWords: [], requireWords: ['proper', 'repack'] };
    expect(releaseRejection('Show.S01E01.720p', filter)).toEqual({ reason: 'missing-required-word' });
    expect(isReleaseAcceptable('Show.S01E01.REPACK.720p', filter)).toBe(true);
  });

  it('accepts everything when both lists are empty', () => {
    expect(isReleaseAcceptable('Anything.At.All', { ignoreWords: [], requireWords: [] })).toBe(true);
  });
});

describe('matchNamesForShow', () => {
  it('uses the canonical name without scene exceptions', () => {
    expect(matchNamesForShow({ name: 'The Show', sceneExceptions: [] })).toEqual(['The Show']);
  });

  it('replaces the canonical name with scene exceptions', () => {
    expect(matchNamesForShow({ name: 'The Show', sceneExceptions: ['Show US', 'Show 2024'] })).toEqual([
      'Show US',
      'Show 2024',
    ]);
  });
});
