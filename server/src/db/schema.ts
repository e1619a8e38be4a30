import { CATEGORIES, STATUSES } from './db.js';
import type { Category, Status } from './db.js';

/** SQL schema for the media table. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS media (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  title       TEXT NOT NULL,
  category    INTEGER NOT NULL,
  status      INTEGER NOT NULL,
  rating      INTEGER,
  notes       TEXT,
  cover_path  TEXT,
  -- seconds since epoch
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_media_title    ON media(title);
CREATE INDEX IF NOT EXISTS idx_media_category ON media(category);
CREATE INDEX IF NOT EXISTS idx_media_status   ON media(status);
`;

export const MEDIA_COLUMNS =
  'id, title, category, status, rating, notes, cover_path, created_at, updated_at';

/** A media row as better-sqlite3 returns it. */
export interface MediaRow {
  id: number;
  title: string;
  category: number;
  status: number;
  rating: number | null;
  notes: string | null;
  cover_path: string | null;
  created_at: number;
  updated_at: number;
}

// Stored codes. Never renumber: rows written by older builds depend on them.
const CATEGORY_CODES: Record<Category, number> = {
  Book: 0,
  Movie: 1,
  Game: 2,
  Music: 3,
  Other: 4,
};

const STATUS_CODES: Record<Status, number> = {
  Planned: 0,
  InProgress: 1,
  Finished: 2,
};

export function categoryToCode(category: Category): number {
  return CATEGORY_CODES[category];
}

/** Unknown codes (e.g. written by a newer build) decode to Other. */
export function codeToCategory(code: number): Category {
  return CATEGORIES.find((c) => CATEGORY_CODES[c] === code) ?? 'Other';
}

export function statusToCode(status: Status): number {
  return STATUS_CODES[status];
}

/** Unknown codes decode to Planned. */
export function codeToStatus(code: number): Status {
  return STATUSES.find((s) => STATUS_CODES[s] === code) ?? 'Planned';
}

/** Ratings are whole numbers; any fraction is dropped. */
export function toStoredRating(rating: number | null): number | null {
  return rating === null ? null : Math.trunc(rating);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
