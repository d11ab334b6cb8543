import fs from 'fs';
import path from 'path';
import { isRecord } from './guards';
import { logger } from './logger';

export const DEFAULT_CACHE_DIR = path.join(__dirname, '..', '..', 'cache');

interface CacheEntry {
  timestamp: number;
  expiresAt: number;
  data: unknown;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    isRecord(value) &&
    typeof value.timestamp === 'number' &&
    typeof value.expiresAt === 'number' &&
    'data' in value
  );
}

/** JSON file cache for scraped datasets. Callers validate what `get` hands back. */
export class Cache {
  constructor(
    private cacheHours: number,
    private cacheDir: string = DEFAULT_CACHE_DIR
  ) {}

  private getCachePath(key: string): string {
    const safeName = key.replace(/[^a-z0-9_-]/gi, '_').toLowerCase();
    return path.join(this.cacheDir, `${safeName}.json`);
  }

  get(key: string): unknown {
    const cachePath = this.getCachePath(key);

    if (!fs.existsSync(cachePath)) {
      logger.info(`Cache miss: ${key}`);
      return null;
    }

    try {
      const entry: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
      if (!isCacheEntry(entry)) {
        logger.warn(`Cache entry malformed, ignoring: ${key}`);
        return null;
      }

      if (Date.now() > entry.expiresAt) {
        logger.info(`Cache expired: ${key}`);
        fs.unlinkSync(cachePath);
        return null;
      }

      const ageHours = ((Date.now() - entry.timestamp) / (1000 * 60 * 60)).toFixed(1);
      logger.success(`Cache hit: ${key} (${ageHours}h old)`);
      return entry.data;
    } catch (error) {
      logger.warn(`Cache read error: ${key}`, error);
      return null;
    }
  }

  set(key: string, data: unknown): void {
    if (!fs.existsSync(this.cacheDir)) {
      fs.mkdirSync(this.cacheDir, { recursive: true });
    }

    const entry: CacheEntry = {
      timestamp: Date.now(),
      expiresAt: Date.now() + this.cacheHours * 60 * 60 * 1000,
      data,
    };

    fs.writeFileSync(this.getCachePath(key), JSON.stringify(entry, null, 2));
    logger.info(`Cache saved: ${key} (expires in ${this.cacheHours}h)`);
  }
}
