import fs from 'fs';
import { RawPostRecord } from '../classification/types';
import { DatasetLoadError, errorMessage } from '../utils/errors';
import { isRecord } from '../utils/guards';
import { logger } from '../utils/logger';

type RecordField = keyof RawPostRecord;

// Matched after lowercasing and dropping everything but letters and digits
const COLUMN_ALIASES: Record<RecordField, string[]> = {
  accountId: ['accountid', 'username', 'ownerusername', 'account'],
  postId: ['postid', 'shortcode', 'id'],
  postedAt: ['postedat', 'date', 'timestamp'],
  likes: ['likes', 'likescount'],
  views: ['views', 'videoplaycount', 'videoviewcount', 'plays'],
  comments: ['comments', 'commentscount'],
  duration: ['duration', 'videoduration'],
  caption: ['caption', 'text'],
  postUrl: ['posturl', 'url'],
};

const FIELDS: readonly RecordField[] = [
  'accountId',
  'postId',
  'postedAt',
  'likes',
  'views',
  'comments',
  'duration',
  'caption',
  'postUrl',
];

export interface LoadedDataset {
  records: RawPostRecord[];
  skipped: number;
}

export function canonicalColumn(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Map one row with arbitrary column spelling onto the raw record fields. */
export function toRawRecord(row: Record<string, unknown>): RawPostRecord {
  const byColumn = new Map<string, unknown>();
  for (const [column, value] of Object.entries(row)) {
    const key = canonicalColumn(column);
    if (!byColumn.has(key)) byColumn.set(key, value);
  }

  const record: RawPostRecord = {};
  for (const field of FIELDS) {
    const alias = COLUMN_ALIASES[field].find(name => {
      const value = byColumn.get(name);
      return value !== undefined && value !== null;
    });
    if (alias !== undefined) {
      record[field] = byColumn.get(alias);
    }
  }
  return record;
}

export function parseDataset(content: unknown, filePath: string): LoadedDataset {
  const rows = Array.isArray(content)
    ? content
    : isRecord(content) && Array.isArray(content.items)
      ? content.items
      : null;

  if (rows === null) {
    throw new DatasetLoadError(filePath, `${filePath} must contain an array of posts or an { items } object`);
  }

  const records: RawPostRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    if (isRecord(row)) {
      records.push(toRawRecord(row));
    } else {
      skipped++;
    }
  }

  return { records, skipped };
}

export function loadDataset(filePath: string): LoadedDataset {
  if (!fs.existsSync(filePath)) {
    throw new DatasetLoadError(filePath, `Dataset not found: ${filePath}`);
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DatasetLoadError(filePath, `Failed to read ${filePath}: ${errorMessage(error)}`);
  }

  const dataset = parseDataset(content, filePath);
  if (dataset.skipped > 0) {
    logger.warn(`[Datasets] Skipped ${dataset.skipped} non-object rows in ${filePath}`);
  }
  logger.info(`[Datasets] Loaded ${dataset.records.length} posts from ${filePath}`);

  return dataset;
}
