import path from 'path';
import { z } from 'zod';
import { formatIssues } from './validation.js';

export const DEFAULT_DB_FILE = 'media_catalog.sqlite';

const envSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DB_PATH: z.string().min(1).optional(),
});

export interface ServerConfig {
    port: number;
    dbPath: string;
}

/** Read settings from the environment (populated from .env by dotenv at startup). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = formatIssues(parsed.error).map((i) => `${i.field}: ${i.message}`);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    return {
        port: parsed.data.PORT,
        dbPath: parsed.data.DB_PATH ?? path.join(cwd, DEFAULT_DB_FILE),
    };
}
