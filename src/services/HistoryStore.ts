import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger.js';
import errorHandler, { ValidationError } from '../utils/ErrorHandler.js';
import type { CountRow, GenerationRow, HistoryDatabase } from '../types/database.js';
import type {
    GenerationRecord,
    HistoryQueryOptions,
    NewGenerationRecord
} from '../types/generation.js';

const logger = createLogger('HistoryStore');

// Constants
const HISTORY_CONSTANTS = {
    DEFAULT_RECENT_LIMIT: 10,
    DEFAULT_SEARCH_LIMIT: 5,
    MAX_LIMIT: 1000,
    TAG_SEPARATOR: ','
} as const;

// SQL Query Templates
const SQL_QUERIES = {
    CREATE_TABLE: `
        CREATE TABLE IF NOT EXISTS generations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            user_prompt TEXT NOT NULL,
            enhanced_prompt TEXT NOT NULL,
            image_path TEXT,
            model_3d_path TEXT,
            tags TEXT
        )`,

    INSERT: `
        INSERT INTO generations (timestamp, user_prompt, enhanced_prompt, image_path, model_3d_path, tags)
        VALUES (@timestamp, @userPrompt, @enhancedPrompt, @imagePath, @modelPath, @tags)`,

    LIST_RECENT: `
        SELECT * FROM generations
        WHERE timestamp >= @since
        ORDER BY id DESC
        LIMIT @limit`,

    // instr() keeps % and _ in the query literal, unlike LIKE
    SEARCH: `
        SELECT * FROM generations
        WHERE timestamp >= @since
          AND (instr(fold(user_prompt), @query) > 0
            OR instr(fold(enhanced_prompt), @query) > 0
            OR instr(fold(tags), @query) > 0)
        ORDER BY id DESC
        LIMIT @limit`,

    GET_BY_ID: 'SELECT * FROM generations WHERE id = ?',

    COUNT: 'SELECT COUNT(*) AS count FROM generations',

    CLEAR: 'DELETE FROM generations'
} as const;

/** Lower bound for `since` filters: every ISO timestamp sorts after it */
const BEGINNING_OF_TIME = '';

/**
 * Case folding shared by stored text and search queries. Registered as the
 * SQL function fold() so both sides use the same Unicode rules.
 */
export function foldCase(value: unknown): string {
    return typeof value === 'string' ? value.toLowerCase() : '';
}

/**
 * Durable, append-only history of pipeline runs backed by SQLite.
 *
 * Searching is a case-insensitive substring match: the query and the three
 * searched columns are folded by the same function, foldCase().
 */
export class HistoryStore {
    private db: HistoryDatabase | null;
    private readonly dbPath: string;

    constructor(dbPath: string) {
        this.db = null;
        this.dbPath = dbPath;
    }

    /**
     * Open the database and create the schema if it is missing.
     * Safe to call more than once.
     */
    init(): void {
        if (this.db) return;

        try {
            if (this.dbPath !== ':memory:') {
                fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
            }

            const db = new Database(this.dbPath);
            db.pragma('journal_mode = WAL');
            db.function('fold', { deterministic: true }, foldCase);
            db.exec(SQL_QUERIES.CREATE_TABLE);
            this.db = db;

            logger.info('History store ready', { dbPath: this.dbPath, records: this.count() });
        } catch (error) {
            errorHandler.handleDatabaseError(error, 'initialization');
        }
    }

    /**
     * Append a record and return its id. Records are never updated.
     */
    insert(record: NewGenerationRecord): number {
        if (record.modelPath !== null && record.imagePath === null) {
            throw new ValidationError('A 3D model path requires an image path', {
                modelPath: record.modelPath
            });
        }

        const db = this.connection();

        try {
            const result = db.prepare(SQL_QUERIES.INSERT).run({
                timestamp: new Date().toISOString(),
                userPrompt: record.userPrompt,
                enhancedPrompt: record.enhancedPrompt,
                imagePath: record.imagePath,
                modelPath: record.modelPath,
                tags: record.tags.join(HISTORY_CONSTANTS.TAG_SEPARATOR)
            });

            const id = Number(result.lastInsertRowid);
            logger.debug('Generation recorded', { id, tagCount: record.tags.length });
            return id;
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'insert');
        }
    }

    /**
     * Most recently inserted records first
     */
    listRecent(limit: number = HISTORY_CONSTANTS.DEFAULT_RECENT_LIMIT, options: HistoryQueryOptions = {}): GenerationRecord[] {
        const db = this.connection();
        const max = this.clampLimit(limit);
        if (max <= 0) return [];

        try {
            const rows = db.prepare(SQL_QUERIES.LIST_RECENT).all({
                since: this.sinceParam(options),
                limit: max
            }) as GenerationRow[];

            return rows.map(row => this.toRecord(row));
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'listRecent');
        }
    }

    /**
     * Records whose prompt, enhanced prompt or tags contain `query`,
     * most recent first
     */
    search(query: string, limit: number = HISTORY_CONSTANTS.DEFAULT_SEARCH_LIMIT, options: HistoryQueryOptions = {}): GenerationRecord[] {
        const db = this.connection();
        const max = this.clampLimit(limit);
        if (max <= 0) return [];

        try {
            const rows = db.prepare(SQL_QUERIES.SEARCH).all({
                query: foldCase(query),
                since: this.sinceParam(options),
                limit: max
            }) as GenerationRow[];

            logger.debug('History search', { queryLength: query.length, matches: rows.length });
            return rows.map(row => this.toRecord(row));
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'search');
        }
    }

    getById(id: number): GenerationRecord | null {
        const db = this.connection();

        try {
            const row = db.prepare(SQL_QUERIES.GET_BY_ID).get(id) as GenerationRow | undefined;
            return row ? this.toRecord(row) : null;
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'getById');
        }
    }

    count(): number {
        const db = this.connection();

        try {
            const row = db.prepare(SQL_QUERIES.COUNT).get() as CountRow;
            return row.count;
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'count');
        }
    }

    /**
     * Irreversibly delete every record
     * @returns Number of records removed
     */
    clearAll(): number {
        const db = this.connection();

        try {
            const result = db.prepare(SQL_QUERIES.CLEAR).run();
            logger.warn('Generation history cleared', { removed: result.changes });
            return result.changes;
        } catch (error) {
            return errorHandler.handleDatabaseError(error, 'clearAll');
        }
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
            logger.debug('History store closed', { dbPath: this.dbPath });
        }
    }

    private connection(): HistoryDatabase {
        if (!this.db) {
            this.init();
        }
        if (!this.db) {
            throw new Error('History store is not initialized');
        }
        return this.db;
    }

    /**
     * Upper-bounded row count; zero or less means no rows (SQLite reads a
     * negative LIMIT as unlimited)
     */
    private clampLimit(limit: number): number {
        if (Number.isNaN(limit)) return 0;
        return Math.min(Math.floor(limit), HISTORY_CONSTANTS.MAX_LIMIT);
    }

    private sinceParam(options: HistoryQueryOptions): string {
        return options.since ? options.since.toISOString() : BEGINNING_OF_TIME;
    }

    private toRecord(row: GenerationRow): GenerationRecord {
        return {
            id: row.id,
            createdAt: row.timestamp,
            userPrompt: row.user_prompt,
            enhancedPrompt: row.enhanced_prompt,
            imagePath: row.image_path,
            modelPath: row.model_3d_path,
            tags: row.tags ? row.tags.split(HISTORY_CONSTANTS.TAG_SEPARATOR) : []
        };
    }
}

export default HistoryStore;
