import { describe, it, expect } from 'vitest';

import {
  checkStructure,
  normalizeFinancial,
  normalizeGenres,
  normalizeMetadata,
  normalizeRecord,
  normalizeRows,
} from '../../src/normalize/normalizer.js';
import type { NormalizeContext } from '../../src/normalize/normalizer.js';
import { RANGE, lookups, rawTable } from './fixtures.js';

const ctx: NormalizeContext = { lookups, range: RANGE };

describe('normalizeMetadata', () => {
  it('unifies columns and coerces values', () => {
    const outcome = normalizeMetadata(
      {
        imdb_id: 'tt0133093',
        title: 'The Matrix',
        release_date: '1999-03-31',
        vote_average: '8.7',
        vote_count: '25000',
        popularity: '80.5',
        runtime: '136',
        genres: "['Action', 'Science Fiction']",
        budget: '63000000',
        revenue: '0',
        overview: 'A hacker learns the truth.',
        original_language: 'en',
        status: 'Released',
        adult: 'False',
      },
      4,
      ctx
    );

    expect(outcome).toEqual({
      ok: true,
      record: {
        dataset: 'metadata',
        rowIndex: 4,
        rawId: 'tt0133093',
        title: 'The Matrix',
        normalizedTitle: 'the matrix',
        year: 1999,
        decade: null,
        releaseDate: '1999-03-31',
        rating: 8.7,
        votes: 25000,
        popularity: 80.5,
        runtime: 136,
        genres: ['Action', 'Sci-Fi'],
        budget: 63000000,
        revenue: null,
        description: 'A hacker learns the truth.',
        tagline: null,
        language: 'en',
        productionCountries: null,
        status: 'Released',
        adult: false,
      },
    });
  });

  it('falls back to the year column when the date is blank', () => {
    const outcome = normalizeMetadata({ title: 'Inception', release_date: '', year: '2010' }, 0, ctx);
    expect(outcome.ok && outcome.record.year).toBe(2010);
  });

  it('keeps out-of-range years for the quality filter', () => {
    const outcome = normalizeMetadata({ title: 'Intolerance', release_date: '1850-09-05' }, 0, ctx);
    expect(outcome.ok && outcome.record.year).toBe(1850);
  });

  it('rejects rows whose date holds no year', () => {
    expect(normalizeMetadata({ title: 'Untitled', release_date: 'TBA' }, 7, ctx)).toEqual({
      ok: false,
      rejection: {
        dataset: 'metadata',
        rowIndex: 7,
        reason: 'MALFORMED_FIELD',
        detail: 'no year in releaseDate=TBA',
      },
    });
  });

  it('rejects rows with no date value at all', () => {
    const outcome = normalizeMetadata({ title: 'Untitled', release_date: '' }, 0, ctx);
    expect(outcome.ok ? null : outcome.rejection.detail).toBe('no value in releaseDate / year');
  });
});

describe('normalizeGenres', () => {
  it('maps certificates, genres and stars', () => {
    const outcome = normalizeGenres(
      {
        movie_id: 'tt4016934',
        movie_name: 'The Handmaiden',
        year: '(I) 2016',
        certificate: 'Not Rated',
        rating: '8.1',
        votes: '150,000',
        runtime: '145 min',
        genre: 'Drama, Romance, Thriller',
        description: 'A woman is hired as a handmaiden.',
        director: 'Park Chan-wook',
        star: 'Kim Min-hee, Kim Tae-ri',
        'gross(in $)': '2,006,788',
      },
      0,
      ctx
    );

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.record.year).toBe(2016);
    expect(outcome.record.certificate).toBe('NR');
    expect(outcome.record.votes).toBe(150000);
    expect(outcome.record.runtime).toBe(145);
    expect(outcome.record.genres).toEqual(['Drama', 'Romance', 'Thriller']);
    expect(outcome.record.stars).toEqual(['Kim Min-hee', 'Kim Tae-ri']);
    expect(outcome.record.totalGross).toBe(2006788);
  });

  it('passes unknown certificates through', () => {
    const outcome = normalizeGenres({ movie_name: 'Somewhere', year: '2001', certificate: 'K-16' }, 0, ctx);
    expect(outcome.ok && outcome.record.certificate).toBe('UNKNOWN');
  });
});

describe('normalizeFinancial', () => {
  it('reads box-office columns and drops any id', () => {
    const outcome = normalizeFinancial(
      {
        Movie: 'Inception',
        'Release Date': 'Jul 16, 2010',
        'Production Budget': '$160,000,000',
        'Domestic Gross': '$292,576,195',
        'Worldwide Gross': '$835,524,642',
      },
      2,
      ctx
    );

    expect(outcome).toEqual({
      ok: true,
      record: {
        dataset: 'financial',
        rowIndex: 2,
        rawId: null,
        title: 'Inception',
        normalizedTitle: 'inception',
        year: 2010,
        decade: null,
        releaseDate: '2010-07-16',
        productionBudget: 160000000,
        domesticGross: 292576195,
        worldwideGross: 835524642,
      },
    });
  });
});

describe('normalizeRecord / normalizeRows', () => {
  it('dispatches on dataset', () => {
    const outcome = normalizeRecord('financial', { title: 'Heat', year: '1995' }, 0, ctx);
    expect(outcome.ok && outcome.record.dataset).toBe('financial');
  });

  it('splits records from rejections with row positions', () => {
    const rows = [
      { title: 'Heat', release_date: '1995-12-15' },
      { title: 'Untitled', release_date: 'soon' },
      { title: 'Ronin', release_date: '1998-09-25' },
    ];
    const result = normalizeRows(rows, (raw, i) => normalizeMetadata(raw, i, ctx));
    expect(result.records.map(r => r.rowIndex)).toEqual([0, 2]);
    expect(result.rejections.map(r => r.rowIndex)).toEqual([1]);
  });
});

describe('checkStructure', () => {
  it('passes tables with a title and a date-like column', () => {
    const table = rawTable('genres', [{ movie_name: 'Heat', year: '1995' }]);
    expect(checkStructure(table, lookups.columns.genres)).toEqual([]);
  });

  it('lists the groups no column satisfies', () => {
    const table = rawTable('financial', [{ Film: 'Heat', Budget: '$60,000,000' }]);
    expect(checkStructure(table, lookups.columns.financial)).toEqual([['title'], ['releaseDate', 'year']]);
  });
});
