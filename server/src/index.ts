import 'dotenv/config';
import { loadConfig } from './config.js';
import { SQLiteRepository } from './db/sqlite.js';
import { createApp } from './app.js';

const config = loadConfig();

// Initialize repository
const repo = new SQLiteRepository(config.dbPath);
repo.init();

const app = createApp(repo);

app.listen(config.port, () => {
    console.log(`Media Catalog server running on http://localhost:${config.port}`);
});
