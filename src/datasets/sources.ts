import { RawPostRecord } from '../classification/types';
import { Config } from '../config';
import { fetchDatasetItems, runActor } from '../scrapers/apify';
import { mapReelItems } from '../scrapers/processor';
import { Cache } from '../utils/cache';
import { logger } from '../utils/logger';
import { loadDataset } from './loader';

type SourceConfig = Pick<
  Config,
  | 'apifyToken'
  | 'apifyActorId'
  | 'apifyDatasetId'
  | 'apifyUsernames'
  | 'apifyResultsLimit'
  | 'organicDatasetPath'
  | 'adDatasetPath'
>;

async function loadApifyDataset(datasetId: string, token: string, cache: Cache): Promise<unknown[]> {
  const cacheKey = `apify_dataset_${datasetId}`;
  const cached = cache.get(cacheKey);

  if (Array.isArray(cached)) {
    logger.info(`Using cached Apify dataset ${datasetId}`);
    return cached;
  }

  const items = await fetchDatasetItems(datasetId, { token });
  cache.set(cacheKey, items);
  return items;
}

async function scrapeReels(cfg: SourceConfig, cache: Cache): Promise<unknown[]> {
  const usernames = [...cfg.apifyUsernames].sort();
  const cacheKey = `apify_reels_${usernames.join('_')}_${cfg.apifyResultsLimit}`;
  const cached = cache.get(cacheKey);

  if (Array.isArray(cached)) {
    logger.info(`Using cached reels for ${usernames.length} accounts`);
    return cached;
  }

  const items = await runActor(
    cfg.apifyActorId,
    { username: usernames, resultsLimit: cfg.apifyResultsLimit },
    { token: cfg.apifyToken }
  );
  cache.set(cacheKey, items);
  return items;
}

/** Organic (scraped reel) posts: a local JSON export, else an Apify dataset id, else a fresh scrape. */
export async function loadOrganicRecords(cfg: SourceConfig, cache: Cache): Promise<RawPostRecord[]> {
  if (cfg.organicDatasetPath) {
    return loadDataset(cfg.organicDatasetPath).records;
  }

  if (cfg.apifyDatasetId) {
    const items = await loadApifyDataset(cfg.apifyDatasetId, cfg.apifyToken, cache);
    return mapReelItems(items);
  }

  if (cfg.apifyUsernames.length > 0) {
    return mapReelItems(await scrapeReels(cfg, cache));
  }

  throw new Error('No organic dataset configured: set ORGANIC_DATASET_PATH, APIFY_DATASET_ID or APIFY_USERNAMES');
}

export function loadAdRecords(cfg: SourceConfig): RawPostRecord[] | undefined {
  if (!cfg.adDatasetPath) {
    logger.info('No AD_DATASET_PATH set; skipping percentile calibration');
    return undefined;
  }
  return loadDataset(cfg.adDatasetPath).records;
}
