import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { MediaItem, MediaRepository } from './db/db.js';
import { createMediaItem, markFinished, touch } from './db/db.js';
import { RepositoryError } from './db/errors.js';
import { catalogTransformer, rowsToCSV } from './transformers/index.js';
import {
    createItemSchema,
    formatIssues,
    idParamSchema,
    listQuerySchema,
    updateItemSchema,
} from './validation.js';

// ---------- helpers ----------

/** Parse input or answer 400; returns undefined when the response was sent. */
function parseOr400<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.output<S> | undefined {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        res.status(400).json({ error: 'Validation failed', details: formatIssues(parsed.error) });
        return undefined;
    }
    return parsed.data;
}

/** Client errors raised by express.json() (malformed, too large, bad charset). */
interface BodyParserError extends Error {
    status: number;
    type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
    if (!(err instanceof Error) || !('status' in err) || !('type' in err)) return false;
    const { status, type } = err;
    return typeof status === 'number' && status >= 400 && status < 500 && typeof type === 'string';
}

function notFound(res: Response): void {
    res.status(404).json({ error: 'Not found' });
}

export function createApp(repo: MediaRepository): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    // ---------- library routes ----------

    app.get('/api/library', (req, res) => {
        const query = parseOr400(listQuerySchema, req.query, res);
        if (!query) return;
        res.json(repo.list(query));
    });

    app.get('/api/library/stats', (_req, res) => {
        res.json(repo.stats());
    });

    app.get('/api/library/:id', (req, res) => {
        const params = parseOr400(idParamSchema, req.params, res);
        if (!params) return;
        const item = repo.get(params.id);
        if (!item) { notFound(res); return; }
        res.json(item);
    });

    app.post('/api/library', (req, res) => {
        const body = parseOr400(createItemSchema, req.body, res);
        if (!body) return;

        const item = createMediaItem(body.title, body.category);
        item.status = body.status ?? item.status;
        item.rating = body.rating ?? null;
        item.notes = body.notes ?? null;
        item.coverPath = body.coverPath ?? null;

        repo.add(item);
        res.status(201).json(item);
    });

    app.put('/api/library/:id', (req, res) => {
        const params = parseOr400(idParamSchema, req.params, res);
        if (!params) return;
        const fields = parseOr400(updateItemSchema, req.body, res);
        if (!fields) return;

        const existing = repo.get(params.id);
        if (!existing) { notFound(res); return; }

        const item: MediaItem = {
            ...existing,
            title: fields.title ?? existing.title,
            category: fields.category ?? existing.category,
            status: fields.status ?? existing.status,
            rating: fields.rating === undefined ? existing.rating : fields.rating,
            notes: fields.notes === undefined ? existing.notes : fields.notes,
            coverPath: fields.coverPath === undefined ? existing.coverPath : fields.coverPath,
        };
        touch(item);

        if (!repo.update(item)) { notFound(res); return; }
        res.json(item);
    });

    app.post('/api/library/:id/finish', (req, res) => {
        const params = parseOr400(idParamSchema, req.params, res);
        if (!params) return;
        const item = repo.get(params.id);
        if (!item) { notFound(res); return; }

        markFinished(item);
        if (!repo.update(item)) { notFound(res); return; }
        res.json(item);
    });

    // Deleting an absent id is not an error.
    app.delete('/api/library/:id', (req, res) => {
        const params = parseOr400(idParamSchema, req.params, res);
        if (!params) return;
        repo.delete(params.id);
        res.status(204).end();
    });

    // ---------- CSV export ----------

    app.get('/api/export/csv', (req, res) => {
        const query = parseOr400(listQuerySchema, req.query, res);
        if (!query) return;

        const result = catalogTransformer(repo.list(query));
        res.setHeader('Content-Type', 'text/csv');
        res.setHeader('Content-Disposition', `attachment; filename="${result.filename}"`);
        res.send(rowsToCSV(result));
    });

    // ---------- errors ----------

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isBodyParserError(err)) {
            if (err.type === 'entity.parse.failed') {
                res.status(400).json({ error: 'Malformed JSON body' });
            } else {
                res.status(err.status).json({ error: err.message });
            }
            return;
        }
        console.error(`${req.method} ${req.path} error:`, err);
        if (err instanceof RepositoryError) {
            res.status(500).json({ error: err.message, kind: err.kind });
            return;
        }
        res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    });

    return app;
}
