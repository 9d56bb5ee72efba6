/**
 * Database Migration Runner
 *
 * Applies the SQL files under MIGRATIONS_DIR in name order, once each, every
 * file in its own transaction together with its bookkeeping row. Only needed
 * for the postgres checkpoint backend.
 *
 * Usage: npm run migrate
 */

import fs from 'fs';
import path from 'path';
import config from '../config';
import { checkConnection, closePool, query, withTransaction } from '../db';
import { ConfigError, errorMessage } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('migrate');

const MIGRATIONS_TABLE = `
    CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) UNIQUE NOT NULL,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
    )`;

function pendingFiles(directory: string, applied: Set<string>): string[] {
    return fs.readdirSync(directory)
        .filter(file => file.endsWith('.sql') && !applied.has(file))
        .sort();
}

async function runMigrations(): Promise<number> {
    const migrationsDir = path.resolve(config.database.migrationsDir);
    if (!fs.existsSync(migrationsDir)) {
        throw new ConfigError(`Migrations directory ${migrationsDir} does not exist`);
    }

    if (!(await checkConnection())) {
        throw new Error(`Cannot connect to ${config.database.url.replace(/\/\/[^@]*@/, '//')}`);
    }

    await query(MIGRATIONS_TABLE);
    const appliedRows = await query<{ name: string }>('SELECT name FROM _migrations');
    const pending = pendingFiles(migrationsDir, new Set(appliedRows.rows.map(row => row.name)));

    for (const file of pending) {
        const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
        logger.info('Applying migration', { file });
        await withTransaction(async client => {
            await client.query(sql);
            await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        });
    }

    return pending.length;
}

runMigrations()
    .then(count => {
        logger.info('Migrations complete', { applied: count });
        return closePool();
    })
    .then(() => process.exit(0))
    .catch(async (error: unknown) => {
        logger.error('Migration failed', { error: errorMessage(error) });
        await closePool();
        process.exit(1);
    });
