/**
 * Database Type Definitions
 *
 * Types for the SQLite history database and better-sqlite3 usage
 */

import type Database from 'better-sqlite3';

/**
 * Row from the generations table
 */
export interface GenerationRow {
    id: number;
    timestamp: string;
    user_prompt: string;
    enhanced_prompt: string;
    image_path: string | null;
    model_3d_path: string | null;
    tags: string | null;
}

/**
 * Count query result
 */
export interface CountRow {
    count: number;
}

/**
 * Typed database instance
 */
export type HistoryDatabase = Database.Database;
