/**
 * Helpers shared by the command-line entry point
 */

import type { GenerationRecord } from '../types/generation.js';
import { ValidationError } from '../utils/ErrorHandler.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const TIME_WINDOWS: Record<string, number> = {
  day: DAY_MS,
  week: 7 * DAY_MS,
  month: 30 * DAY_MS
};

/**
 * Turn a --since value into a cutoff date.
 * Accepts `all`, `day`, `week`, `month`, `<n>d` or an ISO date.
 */
export function parseSince(value: string | undefined, now: Date = new Date()): Date | undefined {
  if (value === undefined || value === 'all') {
    return undefined;
  }

  if (Object.hasOwn(TIME_WINDOWS, value)) {
    return new Date(now.getTime() - TIME_WINDOWS[value]);
  }

  const days = /^(\d+)d$/.exec(value);
  if (days) {
    return new Date(now.getTime() - Number(days[1]) * DAY_MS);
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid --since value: ${value}`, { value });
  }
  return date;
}

export function parseLimit(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`Invalid --limit value: ${value}`, { value });
  }
  return limit;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * One history record as plain text lines
 *
 * @param existing - stored paths that are still present on disk
 */
export function renderRecord(record: GenerationRecord, existing: ReadonlySet<string>): string {
  const describePath = (storedPath: string | null): string => {
    if (storedPath === null) return '-';
    return existing.has(storedPath) ? storedPath : `${storedPath} (missing)`;
  };

  return [
    `#${record.id}  ${record.createdAt}  ${truncate(record.userPrompt, 50)}`,
    `    enhanced: ${truncate(record.enhancedPrompt.replace(/\s+/g, ' '), 200)}`,
    `    tags:     ${record.tags.length > 0 ? record.tags.join(', ') : '-'}`,
    `    image:    ${describePath(record.imagePath)}`,
    `    model:    ${describePath(record.modelPath)}`
  ].join('\n');
}
