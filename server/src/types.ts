/**
 * Shared types for the catalog export.
 * CatalogRow is one exported line, every cell already rendered as text.
 */

export interface CatalogRow {
    id: string;
    title: string;
    category: string;
    status: string;
    rating: string;
    notes: string;
    cover_path: string;
    created_at: string;
    updated_at: string;
}

export const CATALOG_ROW_HEADERS: (keyof CatalogRow)[] = [
    'id', 'title', 'category', 'status', 'rating',
    'notes', 'cover_path', 'created_at', 'updated_at',
];
