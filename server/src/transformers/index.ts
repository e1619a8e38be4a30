/**
 * CSV export.
 * Converts MediaItem[] → delimited text with a fixed column order.
 */

import type { MediaItem } from '../db/db.js';
import { STATUS_LABELS } from '../db/db.js';
import type { CatalogRow } from '../types.js';
import { CATALOG_ROW_HEADERS } from '../types.js';

export interface TransformedResult {
    headers: (keyof CatalogRow)[];
    rows: CatalogRow[];
    filename: string;
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/** YYYY-MM-DD HH:mm:ss in local time */
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** export_YYYYMMDD_HHMMSS.csv */
export function exportFilename(at: Date): string {
    const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
    const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
    return `export_${date}_${time}.csv`;
}

function s(val: string | number | null): string {
    return val === null ? '' : String(val);
}

export function toCatalogRow(item: MediaItem): CatalogRow {
    return {
        id: s(item.id),
        title: item.title,
        category: item.category,
        status: STATUS_LABELS[item.status],
        rating: s(item.rating),
        notes: s(item.notes),
        cover_path: s(item.coverPath),
        created_at: formatTimestamp(item.createdAt),
        updated_at: formatTimestamp(item.updatedAt),
    };
}

export function catalogTransformer(items: MediaItem[], at: Date = new Date()): TransformedResult {
    return {
        headers: [...CATALOG_ROW_HEADERS],
        rows: items.map(toCatalogRow),
        filename: exportFilename(at),
    };
}

export function escapeCSV(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function rowsToCSV(result: TransformedResult): string {
    const lines = [result.headers.join(',')];
    for (const row of result.rows) {
        lines.push(result.headers.map((h) => escapeCSV(row[h])).join(','));
    }
    return lines.join('\n');
}
