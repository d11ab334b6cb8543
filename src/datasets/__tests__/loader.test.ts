import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DatasetLoadError } from '../../utils/errors';
import { canonicalColumn, loadDataset, parseDataset, toRawRecord } from '../loader';

describe('toRawRecord', () => {
  test('canonicalizes column names', () => {
    expect(canonicalColumn('Likes Count')).toBe('likescount');
    expect(canonicalColumn('owner_username')).toBe('ownerusername');
  });

  test('maps aliased columns onto record fields', () => {
    expect(
      toRawRecord({
        'Owner Username': 'creator',
        shortCode: 'XYZ',
        Date: '2024-03-01',
        likes_count: '42',
        videoPlayCount: 300,
        Caption: 'hi',
        extra: true,
      })
    ).toEqual({
      accountId: 'creator',
      postId: 'XYZ',
      postedAt: '2024-03-01',
      likes: '42',
      views: 300,
      caption: 'hi',
    });
  });

  test('reads play counts ahead of view counts, as the scraper mapping does', () => {
    expect(toRawRecord({ videoViewCount: 900, videoPlayCount: 1500 }).views).toBe(1500);
    expect(toRawRecord({ videoViewCount: 900, videoPlayCount: null }).views).toBe(900);
  });

  test('prefers the first alias with a value', () => {
    const record = toRawRecord({ username: null, ownerUsername: 'fallback', likes: 1, likesCount: 99 });

    expect(record.accountId).toBe('fallback');
    expect(record.likes).toBe(1);
  });
});

describe('parseDataset', () => {
  test('accepts a bare array or an items wrapper', () => {
    expect(parseDataset([{ likes: 1 }], 'a.json').records).toEqual([{ likes: 1 }]);
    expect(parseDataset({ items: [{ likes: 2 }] }, 'b.json').records).toEqual([{ likes: 2 }]);
  });

  test('counts rows that are not objects', () => {
    expect(parseDataset([{ likes: 1 }, 5, null], 'a.json')).toEqual({ records: [{ likes: 1 }], skipped: 2 });
  });

  test('rejects other shapes', () => {
    expect(() => parseDataset({ posts: [] }, 'odd.json')).toThrow(DatasetLoadError);
  });
});

describe('loadDataset', () => {
  const previousLevel = process.env.LOG_LEVEL;
  let dir: string;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'silent';
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'labeler-datasets-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
  });

  test('reads a JSON export from disk', () => {
    const filePath = path.join(dir, 'organic.json');
    fs.writeFileSync(filePath, JSON.stringify([{ username: 'a', likes: 3 }, { username: 'b', likes: 4 }]));

    expect(loadDataset(filePath).records).toEqual([
      { accountId: 'a', likes: 3 },
      { accountId: 'b', likes: 4 },
    ]);
  });

  test('reports missing files with their path', () => {
    const filePath = path.join(dir, 'missing.json');

    try {
      loadDataset(filePath);
      throw new Error('expected a DatasetLoadError');
    } catch (error) {
      expect(error).toBeInstanceOf(DatasetLoadError);
      if (error instanceof DatasetLoadError) {
        expect(error.filePath).toBe(filePath);
        expect(error.message).toBe(`Dataset not found: ${filePath}`);
      }
    }
  });

  test('reports invalid JSON', () => {
    const filePath = path.join(dir, 'broken.json');
    fs.writeFileSync(filePath, '[{"likes": 1},');

    expect(() => loadDataset(filePath)).toThrow(DatasetLoadError);
  });
});
