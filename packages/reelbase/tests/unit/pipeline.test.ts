import { describe, it, expect } from 'vitest';

import { MovieDb } from '../../src/db/client.js';
import { runPipeline } from '../../src/pipeline/pipeline.js';
import type { PipelineInputs, PipelineOptions } from '../../src/pipeline/pipeline.js';
import { buildConfig } from '../../src/shared/config.js';
import { PipelineStructureError } from '../../src/shared/errors.js';
import { RunLogger } from '../../src/shared/logger.js';
import type { OutputTables, RawRecord, TableSink } from '../../src/shared/types.js';
import { BASE_DIR, lookups, rawTable } from './fixtures.js';

// ── Raw inputs ─────────────────────────────────────────────────────

function metadataRow(overrides: RawRecord): RawRecord {
  return {
    imdb_id: '',
    title: '',
    release_date: '',
    vote_average: '7.0',
    vote_count: '1000',
    popularity: '10.0',
    runtime: '120',
    genres: '',
    budget: '1000000',
    revenue: '2000000',
    overview: 'Plot.',
    original_language: 'en',
    status: 'Released',
    adult: 'False',
    ...overrides,
  };
}

const METADATA = [
  metadataRow({ imdb_id: '42', title: 'The Matrix', release_date: '1999-03-31' }),
  metadataRow({ title: 'Inception', release_date: '2010', runtime: '148', genres: 'Action|Science Fiction' }),
  metadataRow({ imdb_id: 'tt0499549', title: 'Avatar', release_date: '2009-12-18', genres: 'Action, Adventure' }),
  metadataRow({ imdb_id: 'tt9999999', title: 'Avatar', release_date: '2009-12-10' }),
  metadataRow({ imdb_id: 'tt0006864', title: 'Intolerance', release_date: '1850-09-05' }),
  metadataRow({ imdb_id: 'tt0000002', title: 'Adult Film', release_date: '2005-01-01', adult: 'True' }),
  metadataRow({ imdb_id: 'tt0000003', title: 'Someday', release_date: 'TBA' }),
];

function genreRow(overrides: RawRecord): RawRecord {
  return {
    movie_id: '',
    movie_name: '',
    year: '',
    certificate: '',
    rating: '',
    votes: '',
    runtime: '',
    genre: '',
    description: '',
    director: '',
    star: '',
    'gross(in $)': '',
    ...overrides,
  };
}

const GENRES = [
  genreRow({
    movie_id: '42',
    movie_name: 'The Matrix',
    year: '1999',
    certificate: 'R',
    rating: '8.7',
    votes: '1900000',
    runtime: '136 min',
    genre: 'Action, Sci-Fi',
    description: 'Neo.',
    director: 'Lana Wachowski',
    star: 'Keanu Reeves, Carrie-Anne Moss',
    'gross(in $)': '171479930',
  }),
  genreRow({
    movie_id: 'tt0034583',
    movie_name: 'Casablanca',
    year: '1942',
    certificate: 'PG',
    rating: '8.5',
    votes: '580000',
    runtime: '102 min',
    genre: 'Drama, Romance',
    description: 'A cafe owner.',
    director: 'Michael Curtiz',
    star: 'Humphrey Bogart',
  }),
  genreRow({ movie_id: 'tt0000001', movie_name: 'Sparse', year: '2001', rating: '6.1' }),
];

const FINANCIAL: RawRecord[] = [
  {
    Movie: 'inception',
    'Release Date': 'Jul 16, 2010',
    'Production Budget': '$160,000,000',
    'Domestic Gross': '$292,576,195',
    'Worldwide Gross': '$835,524,642',
  },
  {
    Movie: 'Casablanca',
    'Release Date': 'Nov 26, 1942',
    'Production Budget': '$950,000',
    'Domestic Gross': '$4,000,000',
    'Worldwide Gross': '$4,000,000',
  },
  {
    Movie: 'Nowhere Film',
    'Release Date': 'Mar 1, 2005',
    'Production Budget': '$1,000,000',
    'Domestic Gross': '$10',
    'Worldwide Gross': '',
  },
  {
    Movie: 'Future Film',
    'Release Date': 'Dec 18, 2024',
    'Production Budget': '$200,000,000',
    'Domestic Gross': '',
    'Worldwide Gross': '',
  },
];

function inputs(): PipelineInputs {
  return {
    metadata: rawTable('metadata', METADATA),
    genres: rawTable('genres', GENRES),
    financial: rawTable('financial', FINANCIAL),
  };
}

class RecordingSink implements TableSink {
  readonly calls: OutputTables[] = [];
  writeTables(tables: OutputTables): void {
    this.calls.push(tables);
  }
}

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    lookups,
    quality: { minYear: 1880, maxYear: 2025, nonCriticalNullThreshold: 0.8, asOf: '2024-06-30' },
    logger: new RunLogger({ echo: false }),
    ...overrides,
  };
}

// ── Tests ──────────────────────────────────────────────────────────

describe('runPipeline', () => {
  it('resolves movies across the three datasets', () => {
    const { tables } = runPipeline(inputs(), options());

    expect(tables.movies.map(m => [m.movieId, m.title, m.year, m.decade])).toEqual([
      [1, 'The Matrix', 1999, 1990],
      [2, 'Inception', 2010, 2010],
      [3, 'Avatar', 2009, 2000],
      [4, 'Casablanca', 1942, 1940],
    ]);
  });

  it('merges the id-matched pair into one movie with both genre sources', () => {
    const { tables } = runPipeline(inputs(), options());
    const matrix = tables.movies[0];

    expect(matrix).toMatchObject({
      imdbId: '42',
      certificate: 'R',
      director: 'Lana Wachowski',
      provenance: { metadata: true, genres: true, financial: false },
    });
    const genreIds = tables.movieGenres.filter(mg => mg.movieId === 1).map(mg => mg.genreId);
    const names = genreIds.map(id => tables.genres.find(g => g.genreId === id)?.name);
    expect(names).toEqual(['Action', 'Sci-Fi']);
  });

  it('attaches financial figures through the fallback key', () => {
    const { tables } = runPipeline(inputs(), options());
    const inception = tables.movies[1];

    expect(inception).toMatchObject({
      imdbId: null,
      releaseDate: null,
      productionBudget: 160000000,
      domesticGross: 292576195,
      worldwideGross: 835524642,
      provenance: { metadata: true, genres: false, financial: true },
    });
    expect(tables.movies[3]).toMatchObject({
      productionBudget: 950000,
      provenance: { metadata: false, genres: true, financial: true },
    });
    expect(tables.movies[2].productionBudget).toBeNull();
  });

  it('builds the genre table in first-occurrence order', () => {
    const { tables } = runPipeline(inputs(), options());
    expect(tables.genres.map(g => g.name)).toEqual(['Action', 'Sci-Fi', 'Adventure', 'Drama', 'Romance']);
    expect(tables.movieGenres).toHaveLength(8);
  });

  it('reports per-dataset and resolution counts', () => {
    const { report } = runPipeline(inputs(), options());

    expect(report.datasets.metadata).toEqual({
      rows: 7,
      malformed: 1,
      rejected: { MALFORMED_FIELD: 1, YEAR_OUT_OF_RANGE: 1, ADULT_CONTENT: 1 },
      duplicatesById: 0,
      duplicatesByKey: 1,
      clean: 3,
    });
    expect(report.datasets.genres).toMatchObject({
      rows: 3,
      rejected: { NON_CRITICAL_THRESHOLD_EXCEEDED: 1 },
      clean: 2,
    });
    expect(report.datasets.financial).toMatchObject({ rows: 4, rejected: { NOT_RELEASED: 1 }, clean: 3 });
    expect(report.resolution).toEqual({
      idMatches: 1,
      fallbackMatches: 0,
      metadataOnly: 2,
      genreOnly: 1,
      financialToMetadata: 1,
      financialToGenreOnly: 1,
      unmatchedFinancial: 1,
      collisions: 0,
    });
    expect(report).toMatchObject({ asOf: '2024-06-30', movies: 4, genres: 5, movieGenres: 8 });
  });

  it('compares release dates against a cut-off given in any date format', () => {
    const quality = buildConfig({ quality: { asOf: '2024/06/30' } }, BASE_DIR).quality;
    const { report } = runPipeline(inputs(), options({ quality }));

    expect(report.asOf).toBe('2024-06-30');
    expect(report.datasets.financial).toMatchObject({ rejected: { NOT_RELEASED: 1 }, clean: 3 });
  });

  it('logs record-level diagnostics', () => {
    const logger = new RunLogger({ echo: false });
    runPipeline(inputs(), options({ logger }));

    expect(logger.count('MALFORMED_FIELD')).toBe(1);
    expect(logger.count('NON_CRITICAL_THRESHOLD_EXCEEDED')).toBe(1);
    expect(logger.count('UNMATCHED_FINANCIAL_RECORD')).toBe(1);
    expect(logger.count('AMBIGUOUS_FALLBACK_MATCH')).toBe(0);
  });

  it('hands the tables to the sink exactly once', () => {
    const sink = new RecordingSink();
    const { tables, report } = runPipeline(inputs(), options({ sink }));

    expect(sink.calls).toHaveLength(1);
    expect(sink.calls[0]).toBe(tables);
    expect(report.written).toBe(true);
  });

  it('writes nothing on a dry run', () => {
    const sink = new RecordingSink();
    const { report } = runPipeline(inputs(), options({ sink, dryRun: true }));

    expect(sink.calls).toHaveLength(0);
    expect(report.written).toBe(false);
  });

  it('aborts before any write when a dataset lacks a required column', () => {
    const sink = new RecordingSink();
    const broken = inputs();
    broken.financial = rawTable('financial', [{ Film: 'Heat', 'Release Date': 'Dec 15, 1995' }]);

    expect(() => runPipeline(broken, options({ sink }))).toThrow(PipelineStructureError);
    expect(sink.calls).toHaveLength(0);

    try {
      runPipeline(broken, options({ sink }));
    } catch (err) {
      expect(err instanceof PipelineStructureError && [err.dataset, err.missing]).toEqual([
        'financial',
        [['title']],
      ]);
    }
  });

  it('aborts when the metadata lacks a column its admission rules read', () => {
    const sink = new RecordingSink();
    const withoutStatus = inputs();
    withoutStatus.metadata = rawTable(
      'metadata',
      METADATA.map(({ status: _status, ...rest }) => rest)
    );
    const withoutMetrics = inputs();
    withoutMetrics.metadata = rawTable(
      'metadata',
      METADATA.map(({ runtime: _runtime, budget: _budget, revenue: _revenue, ...rest }) => rest)
    );

    const missingIn = (broken: PipelineInputs) => {
      try {
        runPipeline(broken, options({ sink }));
      } catch (err) {
        return err instanceof PipelineStructureError ? [err.dataset, err.missing] : err;
      }
      return null;
    };

    expect(missingIn(withoutStatus)).toEqual(['metadata', [['status']]]);
    expect(missingIn(withoutMetrics)).toEqual(['metadata', [['runtime', 'budget', 'revenue']]]);
    expect(sink.calls).toHaveLength(0);
  });

  it('stores the tables in SQLite', () => {
    const db = new MovieDb(':memory:');
    try {
      runPipeline(inputs(), options({ sink: db }));

      const movies = db.getMovies();
      expect(movies).toHaveLength(4);
      expect(movies[1]).toMatchObject({
        title: 'Inception',
        production_budget: 160000000,
        from_metadata: 1,
        from_genres: 0,
        from_financial: 1,
      });
      expect(db.getGenres().map(g => g.name)).toEqual(['Action', 'Sci-Fi', 'Adventure', 'Drama', 'Romance']);
      expect(db.getMovieGenres()).toHaveLength(8);
    } finally {
      db.close();
    }
  });
});
