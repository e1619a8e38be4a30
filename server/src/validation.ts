import { z } from 'zod';
import type { ZodError } from 'zod';
import { CATEGORIES, STATUSES, SORT_FIELDS, SORT_ORDERS } from './db/db.js';
import type { Query } from './db/db.js';

/**
 * Request schemas for the library routes.
 * Rating bounds and non-empty titles are enforced here, not in the repository.
 */

export interface ValidationIssue {
    field: string;
    message: string;
}

export function formatIssues(error: ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
    }));
}

export const idParamSchema = z.object({
    id: z.coerce.number().int().positive(),
});

const ratingSchema = z.number().int().min(0).max(10).nullable();

/** Blank text is stored as absent. */
const optionalTextSchema = z
    .string()
    .nullable()
    .transform((v) => (v === null || v.trim() === '' ? null : v));

export const createItemSchema = z.object({
    title: z.string().trim().min(1, 'Title cannot be empty'),
    category: z.enum(CATEGORIES),
    status: z.enum(STATUSES).optional(),
    rating: ratingSchema.optional(),
    notes: optionalTextSchema.optional(),
    coverPath: optionalTextSchema.optional(),
});

export type CreateItemInput = z.infer<typeof createItemSchema>;

export const updateItemSchema = createItemSchema.partial();

export type UpdateItemInput = z.infer<typeof updateItemSchema>;

/** Query-string filters; defaults to most recently updated first. */
export const listQuerySchema = z
    .object({
        title: z.string().optional(),
        category: z.enum(CATEGORIES).optional(),
        status: z.enum(STATUSES).optional(),
        // A blank form field means no rating filter.
        minRating: z.preprocess((v) => (v === '' ? undefined : v), z.coerce.number().int().optional()),
        sort: z.enum(SORT_FIELDS).default('UpdatedAt'),
        order: z.enum(SORT_ORDERS).default('Desc'),
    })
    .transform((q): Query => ({
        titleContains: q.title,
        category: q.category,
        status: q.status,
        minRating: q.minRating,
        sortField: q.sort,
        sortOrder: q.order,
    }));
