import dotenv from 'dotenv';
import path from 'path';
import {
  DEFAULT_CLASSIFICATION_OPTIONS,
  isMissingEstimatePolicy,
  isWindowDirection,
} from './classification/options';
import { ClassificationOptions } from './classification/types';
import { logger } from './utils/logger';

dotenv.config({ path: path.join(__dirname, '..', '.env') });

export interface Config {
  apifyToken: string;
  apifyActorId: string;
  apifyDatasetId: string;
  apifyUsernames: string[];
  apifyResultsLimit: number;
  organicDatasetPath: string;
  adDatasetPath: string;
  cacheHours: number;
  classification: ClassificationOptions;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;

  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    logger.warn(`Ignoring non-numeric ${key}="${raw}", using ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function getListEnv(key: string): string[] {
  return (process.env[key] || '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function getChoiceEnv<T extends string>(key: string, defaultValue: T, isChoice: (value: string) => value is T): T {
  const raw = process.env[key];
  if (!raw) return defaultValue;

  const value = raw.trim();
  if (!isChoice(value)) {
    logger.warn(`Ignoring unknown ${key}="${raw}", using ${defaultValue}`);
    return defaultValue;
  }
  return value;
}

export function loadConfig(): Config {
  const defaults = DEFAULT_CLASSIFICATION_OPTIONS;

  return {
    apifyToken: getEnvOrDefault('APIFY_TOKEN', ''),
    apifyActorId: getEnvOrDefault('APIFY_ACTOR_ID', 'apify~instagram-reel-scraper'),
    apifyDatasetId: getEnvOrDefault('APIFY_DATASET_ID', ''),
    apifyUsernames: getListEnv('APIFY_USERNAMES'),
    apifyResultsLimit: getNumberEnv('APIFY_RESULTS_LIMIT', 100),
    organicDatasetPath: getEnvOrDefault('ORGANIC_DATASET_PATH', ''),
    adDatasetPath: getEnvOrDefault('AD_DATASET_PATH', ''),
    cacheHours: getNumberEnv('CACHE_HOURS', 24),
    classification: {
      windowSize: getNumberEnv('VIRAL_WINDOW_SIZE', defaults.windowSize),
      viralMultiplier: getNumberEnv('VIRAL_MULTIPLIER', defaults.viralMultiplier),
      maxPostsPerAccount: getNumberEnv('MAX_POSTS_PER_ACCOUNT', defaults.maxPostsPerAccount),
      minPostsPerAccount: getNumberEnv('MIN_POSTS_PER_ACCOUNT', defaults.minPostsPerAccount),
      topFraction: getNumberEnv('TOP_FRACTION', defaults.topFraction),
      windowDirection: getChoiceEnv('WINDOW_DIRECTION', defaults.windowDirection, isWindowDirection),
      missingEstimatePolicy: getChoiceEnv(
        'MISSING_ESTIMATE_POLICY',
        defaults.missingEstimatePolicy,
        isMissingEstimatePolicy
      ),
    },
  };
}

export const config: Config = loadConfig();
