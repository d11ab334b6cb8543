/**
 * Top-fraction engagement thresholds.
 *
 * The ad and organic datasets are scraped separately and sit on very different
 * engagement scales, so each one gets its own cutoff: sort descending and take the
 * ceil(p * n)-th value. Exactly ceil(p * n) items reach the cutoff when values are distinct.
 */

import { logger } from '../utils/logger';
import { validateTopFraction } from './options';
import {
  CalibratedThresholds,
  EngagementMetric,
  NormalizedPost,
  NumericField,
  PercentileThreshold,
} from './types';

function readField(field: NumericField): (post: NormalizedPost) => number {
  return post => post[field];
}

export function resolveMetric(metric: EngagementMetric): (post: NormalizedPost) => number {
  const read = typeof metric === 'function' ? metric : readField(metric);
  return post => {
    const value = read(post);
    return Number.isFinite(value) ? value : 0;
  };
}

/** ceil(p * n), ignoring float noise such as 0.7 * 10 = 7.000000000000001. */
export function topCountFor(topFraction: number, sampleSize: number): number {
  if (sampleSize === 0) return 0;
  const scaled = topFraction * sampleSize;
  const nearest = Math.round(scaled);
  const count = Math.abs(scaled - nearest) < 1e-9 ? nearest : Math.ceil(scaled);
  return Math.min(Math.max(count, 1), sampleSize);
}

export function computePercentileThreshold(
  posts: readonly NormalizedPost[],
  topFraction: number,
  metric: EngagementMetric = 'likes'
): PercentileThreshold {
  validateTopFraction(topFraction);

  if (posts.length === 0) {
    return { threshold: null, sampleSize: 0, topCount: 0 };
  }

  const read = resolveMetric(metric);
  const values = posts.map(read).sort((a, b) => b - a);
  const topCount = topCountFor(topFraction, values.length);

  return { threshold: values[topCount - 1], sampleSize: values.length, topCount };
}

export function calibrateThresholds(
  adPosts: readonly NormalizedPost[],
  organicPosts: readonly NormalizedPost[],
  topFraction: number,
  metric: EngagementMetric = 'likes'
): CalibratedThresholds {
  const ad = computePercentileThreshold(adPosts, topFraction, metric);
  const organic = computePercentileThreshold(organicPosts, topFraction, metric);

  logger.info(
    `[Calibrator] Top ${(topFraction * 100).toFixed(0)}% thresholds: ad=${ad.threshold ?? 'n/a'} (${ad.sampleSize} posts), organic=${organic.threshold ?? 'n/a'} (${organic.sampleSize} posts)`
  );
  if (ad.threshold === null || organic.threshold === null) {
    logger.warn('[Calibrator] One dataset is empty; its threshold is undefined');
  }

  return { ad, organic };
}

/** Single-pass labeling against a fixed cutoff. A `null` threshold marks nothing viral. */
export function labelByPercentile<T extends NormalizedPost>(
  posts: readonly T[],
  threshold: number | null,
  metric: EngagementMetric = 'likes'
): Array<T & { viral: boolean }> {
  const read = resolveMetric(metric);
  return posts.map(post => ({
    ...post,
    viral: threshold !== null && read(post) >= threshold,
  }));
}
