import { extractPostIdFromUrl } from '../utils/postId';
import { NormalizedPost, RawPostRecord } from './types';

// Epoch numbers below this are read as seconds (1e11 s is in the year 5138)
const EPOCH_SECONDS_LIMIT = 1e11;

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// "2024-03-01 18:30:00" style stamps with no offset are pinned to UTC, not the host zone
const NAIVE_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const ms = Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value;
    const date = new Date(ms);
    // Past +/-8.64e15 ms a Date is invalid
    return Number.isNaN(date.getTime()) ? null : date;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return null;

    const text = NAIVE_DATETIME_PATTERN.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed;
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  return null;
}

export function coerceNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return fallback;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

function coerceKey(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function coerceOptionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

export function normalizePost(raw: RawPostRecord): NormalizedPost {
  const postUrl = coerceOptionalString(raw.postUrl);

  return {
    accountId: coerceKey(raw.accountId),
    postId: coerceKey(raw.postId) ?? extractPostIdFromUrl(postUrl),
    postedAt: parseTimestamp(raw.postedAt),
    likes: coerceNumber(raw.likes),
    views: coerceNumber(raw.views),
    comments: coerceNumber(raw.comments),
    duration: coerceNumber(raw.duration),
    caption: typeof raw.caption === 'string' ? raw.caption : '',
    postUrl,
  };
}

/** Lenient by policy: bad values become defaults, nothing here throws. */
export function normalizePosts(records: readonly RawPostRecord[]): NormalizedPost[] {
  return records.map(normalizePost);
}
