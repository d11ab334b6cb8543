import axios from 'axios';
import { ScrapeError } from '../utils/errors';
import { logger } from '../utils/logger';

const APIFY_BASE_URL = 'https://api.apify.com/v2';

export interface ApifyRequestOptions {
  token: string;
  timeoutMs?: number;
}

export interface ReelScraperInput {
  username: string[];
  resultsLimit?: number;
  [key: string]: unknown;
}

function requireToken(token: string): string {
  if (!token) {
    throw new ScrapeError('Missing required environment variable: APIFY_TOKEN');
  }
  return token;
}

function ensureItems(data: unknown, source: string): unknown[] {
  if (!Array.isArray(data)) {
    throw new ScrapeError(`Unexpected Apify response for ${source}: expected an array of items`);
  }
  return data;
}

function toScrapeError(error: unknown, context: string): unknown {
  if (axios.isAxiosError(error)) {
    logger.error(`[Apify] ${context}: ${error.message}`);
    return new ScrapeError(`${context}: ${error.message}`, error.response?.status ?? null);
  }
  return error;
}

/** Run an actor synchronously and return its dataset items. */
export async function runActor(
  actorId: string,
  input: ReelScraperInput,
  options: ApifyRequestOptions
): Promise<unknown[]> {
  const token = requireToken(options.token);
  logger.info(`[Apify] Running ${actorId} for ${input.username.length} accounts`);

  try {
    const response = await axios.post<unknown>(
      `${APIFY_BASE_URL}/acts/${actorId}/run-sync-get-dataset-items`,
      input,
      {
        params: { token },
        timeout: options.timeoutMs ?? 300000, // 5 minutes
      }
    );

    const items = ensureItems(response.data, actorId);
    logger.success(`Scraped ${items.length} items with ${actorId}`);
    return items;
  } catch (error) {
    throw toScrapeError(error, `Failed to run ${actorId}`);
  }
}

/** Read the items of a finished run's dataset. */
export async function fetchDatasetItems(
  datasetId: string,
  options: ApifyRequestOptions
): Promise<unknown[]> {
  const token = requireToken(options.token);
  logger.info(`[Apify] Fetching dataset ${datasetId}`);

  try {
    const response = await axios.get<unknown>(`${APIFY_BASE_URL}/datasets/${datasetId}/items`, {
      params: { token, format: 'json', clean: true },
      timeout: options.timeoutMs ?? 120000,
    });

    const items = ensureItems(response.data, `dataset ${datasetId}`);
    logger.success(`Fetched ${items.length} items from dataset ${datasetId}`);
    return items;
  } catch (error) {
    throw toScrapeError(error, `Failed to fetch dataset ${datasetId}`);
  }
}
