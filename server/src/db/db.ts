/**
 * MediaItem — the canonical data model for catalog entries.
 * Timestamps carry whole-second precision, matching what the store keeps.
 */

export const CATEGORIES = ['Book', 'Movie', 'Game', 'Music', 'Other'] as const;
export type Category = (typeof CATEGORIES)[number];

/** Ordered by workflow progression; any status may follow any other. */
export const STATUSES = ['Planned', 'InProgress', 'Finished'] as const;
export type Status = (typeof STATUSES)[number];

export const STATUS_LABELS: Record<Status, string> = {
  Planned: 'Planned',
  InProgress: 'In Progress',
  Finished: 'Finished',
};

export interface MediaItem {
  /** Null until the repository assigns one on insert. */
  id: number | null;
  title: string;
  category: Category;
  status: Status;
  rating: number | null;
  notes: string | null;
  coverPath: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const SORT_FIELDS = ['Title', 'Category', 'Status', 'Rating', 'CreatedAt', 'UpdatedAt'] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export const SORT_ORDERS = ['Asc', 'Desc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

/** Filter + sort for a listing. Unset filters match everything. */
export interface Query {
  titleContains?: string;
  category?: Category;
  status?: Status;
  minRating?: number;
  sortField: SortField;
  sortOrder: SortOrder;
}

export interface Stats {
  total: number;
  /** Only categories with at least one record appear. */
  byCategory: Partial<Record<Category, number>>;
  finished: number;
  unfinished: number;
}

/**
 * MediaRepository — persistence contract consumed by the HTTP layer.
 * Every operation throws a RepositoryError on failure.
 */
export interface MediaRepository {
  /** Create the schema if missing. Safe to call on every startup. */
  init(): void;

  /** Insert a new item, write the assigned id back onto it and return the id. */
  add(item: MediaItem): number;

  /**
   * Overwrite the mutable fields of the row matching item.id.
   * Returns false (without failing) when no row matched.
   */
  update(item: MediaItem): boolean;

  /** Remove a row. Returns false (without failing) when it was absent. */
  delete(id: number): boolean;

  get(id: number): MediaItem | null;

  list(query: Query): MediaItem[];

  /** Global counts, independent of any query. */
  stats(): Stats;

  close(): void;
}

/** Current time truncated to the second. */
export function now(): Date {
  return new Date(Math.floor(Date.now() / 1000) * 1000);
}

export function createMediaItem(title: string, category: Category): MediaItem {
  const stamp = now();
  return {
    id: null,
    title,
    category,
    status: 'Planned',
    rating: null,
    notes: null,
    coverPath: null,
    createdAt: stamp,
    updatedAt: new Date(stamp.getTime()),
  };
}

export function touch(item: MediaItem): void {
  item.updatedAt = now();
}

export function markFinished(item: MediaItem): void {
  item.status = 'Finished';
  touch(item);
}

export function setRating(item: MediaItem, rating: number | null): void {
  item.rating = rating;
  touch(item);
}

export function createQuery(overrides: Partial<Query> = {}): Query {
  return { sortField: 'Title', sortOrder: 'Asc', ...overrides };
}
