import { RawPostRecord } from '../classification/types';
import { isRecord } from '../utils/guards';
import { logger } from '../utils/logger';
import { extractPostIdFromUrl } from '../utils/postId';

/** Fields of an `apify/instagram-reel-scraper` item that the labeler reads. */
export interface InstagramReelItem {
  id?: unknown;
  shortCode?: unknown;
  url?: unknown;
  caption?: unknown;
  ownerUsername?: unknown;
  timestamp?: unknown;
  likesCount?: unknown;
  commentsCount?: unknown;
  videoViewCount?: unknown;
  videoPlayCount?: unknown;
  videoDuration?: unknown;
}

function pickShortCode(item: InstagramReelItem): unknown {
  if (typeof item.shortCode === 'string' && item.shortCode) return item.shortCode;
  return extractPostIdFromUrl(item.url);
}

export function mapReelItem(item: InstagramReelItem): RawPostRecord {
  return {
    accountId: item.ownerUsername,
    postId: pickShortCode(item),
    postedAt: item.timestamp,
    likes: item.likesCount,
    views: item.videoPlayCount ?? item.videoViewCount,
    comments: item.commentsCount,
    duration: item.videoDuration,
    caption: item.caption,
    postUrl: item.url,
  };
}

export function mapReelItems(items: readonly unknown[]): RawPostRecord[] {
  const records: RawPostRecord[] = [];
  let skipped = 0;

  for (const item of items) {
    if (isRecord(item)) {
      records.push(mapReelItem(item));
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn(`[Processor] Skipped ${skipped} scraper items that were not objects`);
  }
  logger.info(`[Processor] Mapped ${records.length} reels`);

  return records;
}
