import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { MediaItem, MediaRepository, Query, Stats } from './db.js';
import { createQuery } from './db.js';
import {
  SCHEMA_SQL,
  MEDIA_COLUMNS,
  categoryToCode,
  codeToCategory,
  statusToCode,
  codeToStatus,
  toStoredRating,
  toEpochSeconds,
  fromEpochSeconds,
} from './schema.js';
import type { MediaRow } from './schema.js';
import { compileListQuery } from './query.js';
import type { SqlParam } from './query.js';
import { RepositoryError, resourceError, toRepositoryError } from './errors.js';

export const IN_MEMORY = ':memory:';

/**
 * SQLite implementation of MediaRepository.
 * Owns a single better-sqlite3 connection; every operation runs inside withConnection.
 */
export class SQLiteRepository implements MediaRepository {
    private readonly db: Database.Database;
    private busy = false;

    constructor(dbPath: string) {
        this.db = openDatabase(dbPath);
    }

    init(): void {
        this.withConnection('init', (db) => db.exec(SCHEMA_SQL));
        console.log(`SQLite database initialized at ${this.db.name}`);
    }

    add(item: MediaItem): number {
        const id = this.withConnection('add', (db) => {
            const result = db.prepare(`
                INSERT INTO media (title, category, status, rating, notes, cover_path, created_at, updated_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            `).run(
                item.title,
                categoryToCode(item.category),
                statusToCode(item.status),
                toStoredRating(item.rating),
                item.notes,
                item.coverPath,
                toEpochSeconds(item.createdAt),
                toEpochSeconds(item.updatedAt),
            );
            return Number(result.lastInsertRowid);
        });
        item.id = id;
        return id;
    }

    update(item: MediaItem): boolean {
        return this.withConnection('update', (db) => {
            const result = db.prepare(`
                UPDATE media
                SET title = ?, category = ?, status = ?, rating = ?, notes = ?, cover_path = ?, updated_at = ?
                WHERE id = ?
            `).run(
                item.title,
                categoryToCode(item.category),
                statusToCode(item.status),
                toStoredRating(item.rating),
                item.notes,
                item.coverPath,
                toEpochSeconds(item.updatedAt),
                item.id,
            );
            return result.changes > 0;
        });
    }

    delete(id: number): boolean {
        return this.withConnection('delete', (db) =>
            db.prepare<[number]>('DELETE FROM media WHERE id = ?').run(id).changes > 0,
        );
    }

    get(id: number): MediaItem | null {
        return this.withConnection('get', (db) => {
            const row = db.prepare<[number], MediaRow>(`SELECT ${MEDIA_COLUMNS} FROM media WHERE id = ?`).get(id);
            return row ? rowToMediaItem(row) : null;
        });
    }

    list(query: Query = createQuery()): MediaItem[] {
        const { sql, params } = compileListQuery(query);
        return this.withConnection('list', (db) =>
            db.prepare<SqlParam[], MediaRow>(sql).all(...params).map(rowToMediaItem),
        );
    }

    stats(): Stats {
        return this.withConnection('stats', (db) => {
            const total = db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM media').get()?.c ?? 0;

            const byCategory: Stats['byCategory'] = {};
            const groups = db
                .prepare<[], { category: number; c: number }>('SELECT category, COUNT(*) AS c FROM media GROUP BY category')
                .all();
            for (const { category, c } of groups) {
                // Several unknown codes can decode to the same category.
                const name = codeToCategory(category);
                byCategory[name] = (byCategory[name] ?? 0) + c;
            }

            const finished =
                db.prepare<[number], { c: number }>('SELECT COUNT(*) AS c FROM media WHERE status = ?')
                    .get(statusToCode('Finished'))?.c ?? 0;

            return { total, byCategory, finished, unfinished: total - finished };
        });
    }

    close(): void {
        this.withConnection('close', (db) => db.close());
    }

    /** Scoped, exclusive use of the connection; released on every exit path. */
    private withConnection<T>(operation: string, fn: (db: Database.Database) => T): T {
        if (this.busy) {
            throw new RepositoryError('other', `${operation} refused: connection is already in use`);
        }
        this.busy = true;
        try {
            return fn(this.db);
        } catch (err) {
            throw toRepositoryError(err, operation);
        } finally {
            this.busy = false;
        }
    }
}

function openDatabase(dbPath: string): Database.Database {
    try {
        if (dbPath !== IN_MEMORY) {
            // Ensure data directory exists
            const dir = path.dirname(dbPath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }
        const db = new Database(dbPath);
        db.pragma('journal_mode = WAL');
        return db;
    } catch (err) {
        throw resourceError(err, dbPath);
    }
}

/** Convert a DB row to a MediaItem */
function rowToMediaItem(row: MediaRow): MediaItem {
    return {
        id: row.id,
        title: row.title,
        category: codeToCategory(row.category),
        status: codeToStatus(row.status),
        rating: row.rating,
        notes: row.notes,
        coverPath: row.cover_path,
        createdAt: fromEpochSeconds(row.created_at),
        updatedAt: fromEpochSeconds(row.updated_at),
    };
}
