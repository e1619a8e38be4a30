import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { SQLiteRepository, IN_MEMORY } from './sqlite.js';
import { RepositoryError } from './errors.js';
import { createQuery } from './db.js';
import type { Category, MediaItem } from './db.js';

const T0 = new Date(1_700_000_000_000);

function item(title: string, category: Category, overrides: Partial<MediaItem> = {}): MediaItem {
  return {
    id: null,
    title,
    category,
    status: 'Planned',
    rating: null,
    notes: null,
    coverPath: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

function titles(items: MediaItem[]): string[] {
  return items.map((i) => i.title);
}

function catchRepositoryError(fn: () => unknown): RepositoryError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RepositoryError) return err;
    throw err;
  }
  throw new Error('expected a RepositoryError');
}

describe('SQLiteRepository', () => {
  let dir: string;
  let dbPath: string;
  let repo: SQLiteRepository;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
    dbPath = path.join(dir, 'catalog.sqlite');
    repo = new SQLiteRepository(dbPath);
    repo.init();
  });

  afterEach(() => {
    repo.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('add / get', () => {
    it('assigns the id onto the record and returns it', () => {
      const dune = item('Dune', 'Book');
      const id = repo.add(dune);
      expect(id).toBe(1);
      expect(dune.id).toBe(1);
      expect(repo.add(item('Heat', 'Movie'))).toBe(2);
    });

    it('get returns the inserted record field for field', () => {
      const record = item('Outer Wilds', 'Game', {
        status: 'InProgress',
        rating: 9,
        notes: 'DLC next',
        coverPath: '/covers/outer-wilds.png',
        updatedAt: new Date(1_700_000_360_000),
      });
      const id = repo.add(record);
      expect(repo.get(id)).toEqual(record);
    });

    it('keeps out-of-convention ratings and empty titles as given', () => {
      const id = repo.add(item('', 'Other', { rating: 42 }));
      const stored = repo.get(id);
      expect(stored?.title).toBe('');
      expect(stored?.rating).toBe(42);
    });

    it('stores ratings as whole numbers', () => {
      const record = item('Arrival', 'Movie', { rating: 7.9 });
      const id = repo.add(record);
      expect(repo.get(id)?.rating).toBe(7);

      expect(repo.update({ ...record, rating: 4.5 })).toBe(true);
      expect(repo.get(id)?.rating).toBe(4);
      expect(repo.list(createQuery({ minRating: 5 }))).toEqual([]);
    });

    it('returns null for a missing id', () => {
      expect(repo.get(999)).toBeNull();
    });
  });

  describe('update', () => {
    it('changes the mutable fields and leaves id and createdAt alone', () => {
      const original = item('Kind of Blue', 'Music');
      const id = repo.add(original);

      const changed: MediaItem = {
        ...original,
        title: 'Kind of Blue (Legacy)',
        category: 'Other',
        status: 'Finished',
        rating: 10,
        notes: 'vinyl',
        coverPath: 'covers/kob.jpg',
        createdAt: new Date(1_800_000_000_000),
        updatedAt: new Date(1_700_000_500_000),
      };
      expect(repo.update(changed)).toBe(true);

      expect(repo.get(id)).toEqual({ ...changed, id, createdAt: T0 });
    });

    it('is a silent no-op for an unknown id', () => {
      repo.add(item('Dune', 'Book'));
      expect(repo.update(item('Ghost', 'Movie', { id: 77 }))).toBe(false);
      expect(repo.update(item('Unsaved', 'Movie'))).toBe(false);
      expect(titles(repo.list(createQuery()))).toEqual(['Dune']);
    });
  });

  describe('delete', () => {
    it('removes the row', () => {
      const id = repo.add(item('Dune', 'Book'));
      expect(repo.delete(id)).toBe(true);
      expect(repo.get(id)).toBeNull();
    });

    it('is a silent no-op when absent', () => {
      expect(repo.delete(12)).toBe(false);
    });
  });

  describe('list', () => {
    it('returns every record by title when no filter is set', () => {
      for (const t of ['Myst', 'Akira', 'Jaws']) repo.add(item(t, 'Movie'));
      expect(titles(repo.list(createQuery()))).toEqual(['Akira', 'Jaws', 'Myst']);
    });

    it('applies all filters as a conjunction', () => {
      repo.add(item('Anathem', 'Book', { rating: 9 }));
      repo.add(item('Dracula', 'Book', { rating: 5 }));
      repo.add(item('Emma', 'Book', { rating: 4 }));
      repo.add(item('Solaris', 'Movie', { rating: 8 }));
      repo.add(item('Ubik', 'Book', { rating: 10 }));
      repo.add(item('ALIEN', 'Book', { rating: 7 }));
      repo.add(item('Snow Crash', 'Book'));

      const result = repo.list(createQuery({ titleContains: 'a', category: 'Book', minRating: 5 }));
      expect(titles(result)).toEqual(['Anathem', 'Dracula']);
    });

    it('filters by status', () => {
      repo.add(item('Hades', 'Game', { status: 'Finished' }));
      repo.add(item('Tunic', 'Game', { status: 'InProgress' }));
      expect(titles(repo.list(createQuery({ status: 'InProgress' })))).toEqual(['Tunic']);
    });

    it('puts unrated records last in both rating directions', () => {
      repo.add(item('Dark', 'Movie'));
      repo.add(item('Brazil', 'Movie', { rating: 3 }));
      repo.add(item('Casablanca', 'Movie'));
      repo.add(item('Alien', 'Movie', { rating: 7 }));
      repo.add(item('Eraserhead', 'Movie', { rating: 7 }));

      expect(titles(repo.list(createQuery({ sortField: 'Rating', sortOrder: 'Asc' })))).toEqual([
        'Brazil', 'Alien', 'Eraserhead', 'Casablanca', 'Dark',
      ]);
      expect(titles(repo.list(createQuery({ sortField: 'Rating', sortOrder: 'Desc' })))).toEqual([
        'Alien', 'Eraserhead', 'Brazil', 'Casablanca', 'Dark',
      ]);
    });

    it('breaks category ties by title ascending', () => {
      repo.add(item('Zork', 'Game'));
      repo.add(item('Mort', 'Book'));
      repo.add(item('Abzu', 'Game'));
      repo.add(item('Emma', 'Book'));

      expect(titles(repo.list(createQuery({ sortField: 'Category', sortOrder: 'Asc' })))).toEqual([
        'Emma', 'Mort', 'Abzu', 'Zork',
      ]);
      expect(titles(repo.list(createQuery({ sortField: 'Category', sortOrder: 'Desc' })))).toEqual([
        'Abzu', 'Zork', 'Emma', 'Mort',
      ]);
    });

    it('breaks status ties by most recently updated', () => {
      repo.add(item('Old plan', 'Book', { updatedAt: new Date(1_700_000_100_000) }));
      repo.add(item('Done', 'Book', { status: 'Finished' }));
      repo.add(item('New plan', 'Book', { updatedAt: new Date(1_700_000_900_000) }));

      expect(titles(repo.list(createQuery({ sortField: 'Status', sortOrder: 'Asc' })))).toEqual([
        'New plan', 'Old plan', 'Done',
      ]);
      expect(titles(repo.list(createQuery({ sortField: 'Status', sortOrder: 'Desc' })))).toEqual([
        'Done', 'New plan', 'Old plan',
      ]);
    });

    it('sorts by timestamps', () => {
      repo.add(item('B', 'Other', { createdAt: new Date(1_600_000_000_000), updatedAt: new Date(1_700_000_200_000) }));
      repo.add(item('A', 'Other', { createdAt: new Date(1_650_000_000_000), updatedAt: new Date(1_700_000_100_000) }));

      expect(titles(repo.list(createQuery({ sortField: 'CreatedAt', sortOrder: 'Desc' })))).toEqual(['A', 'B']);
      expect(titles(repo.list(createQuery({ sortField: 'UpdatedAt', sortOrder: 'Desc' })))).toEqual(['B', 'A']);
    });

    it('does not keep or modify the query', () => {
      const query = createQuery({ titleContains: ' Dune ' });
      repo.list(query);
      expect(query).toEqual({ titleContains: ' Dune ', sortField: 'Title', sortOrder: 'Asc' });
    });
  });

  describe('stats', () => {
    it('is all zeros on an empty store', () => {
      expect(repo.stats()).toEqual({ total: 0, byCategory: {}, finished: 0, unfinished: 0 });
    });

    it('keeps unfinished and category counts consistent with the total', () => {
      repo.add(item('Hades', 'Game', { status: 'Finished' }));
      repo.add(item('Tunic', 'Game', { status: 'InProgress' }));
      repo.add(item('Emma', 'Book', { status: 'Finished' }));
      repo.add(item('Heat', 'Movie'));

      const stats = repo.stats();
      expect(stats).toEqual({
        total: 4,
        byCategory: { Game: 2, Book: 1, Movie: 1 },
        finished: 2,
        unfinished: 2,
      });
      const sum = Object.values(stats.byCategory).reduce((a, b) => a + b, 0);
      expect(sum).toBe(stats.total);
    });

    it('ignores list filters', () => {
      repo.add(item('Dune', 'Book'));
      repo.list(createQuery({ category: 'Movie' }));
      expect(repo.stats().total).toBe(1);
    });
  });

  it('runs the add, list and stats scenario end to end', () => {
    const dune = item('Dune', 'Movie');
    const messiah = item('Dune Messiah', 'Book', { rating: 8 });
    repo.add(dune);
    repo.add(messiah);
    repo.add(item('Foundation', 'Book', { rating: 6 }));

    expect(repo.list(createQuery({ titleContains: 'Dune', sortField: 'Title', sortOrder: 'Asc' }))).toEqual([
      dune,
      messiah,
    ]);
    expect(repo.stats()).toEqual({
      total: 3,
      byCategory: { Book: 2, Movie: 1 },
      finished: 0,
      unfinished: 3,
    });
  });

  describe('unknown stored codes', () => {
    it('decode to Other and Planned and are counted under Other', () => {
      repo.add(item('Known', 'Other'));

      const raw = new Database(dbPath);
      raw.prepare(
        'INSERT INTO media (title, category, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
      ).run('From the future', 9, 7, 1_700_000_000, 1_700_000_000);
      raw.close();

      const future = repo.list(createQuery({ titleContains: 'future' }));
      expect(future).toHaveLength(1);
      expect(future[0]?.category).toBe('Other');
      expect(future[0]?.status).toBe('Planned');
      expect(repo.stats()).toEqual({ total: 2, byCategory: { Other: 2 }, finished: 0, unfinished: 2 });
    });
  });

  describe('init', () => {
    it('is idempotent and keeps existing rows', () => {
      repo.add(item('Dune', 'Book'));
      repo.init();
      repo.close();

      repo = new SQLiteRepository(dbPath);
      repo.init();
      expect(titles(repo.list(createQuery()))).toEqual(['Dune']);

      const raw = new Database(dbPath);
      const indexes = raw
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'media' ORDER BY name")
        .all()
        .map((r) => r.name);
      raw.close();
      expect(indexes).toEqual(['idx_media_category', 'idx_media_status', 'idx_media_title']);
    });
  });

  describe('errors', () => {
    it('reports statement failures as storage errors', () => {
      const fresh = new SQLiteRepository(IN_MEMORY);
      const err = catchRepositoryError(() => fresh.list(createQuery()));
      fresh.close();
      expect(err.kind).toBe('storage');
      expect(err.message).toMatch(/^list failed: no such table: media/);
    });

    it('reports an unopenable path as a resource error', () => {
      const blocker = path.join(dir, 'blocker');
      writeFileSync(blocker, 'not a directory');
      const err = catchRepositoryError(() => new SQLiteRepository(path.join(blocker, 'nested', 'db.sqlite')));
      expect(err.kind).toBe('resource');
    });

    it('releases the connection after a failed operation', () => {
      const fresh = new SQLiteRepository(IN_MEMORY);
      expect(() => fresh.stats()).toThrow(RepositoryError);
      fresh.init();
      expect(fresh.stats().total).toBe(0);
      fresh.close();
    });
  });
});
