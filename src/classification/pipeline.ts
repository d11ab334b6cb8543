import { logger, isLevelEnabled } from '../utils/logger';
import { labelPosts } from './labeler';
import { filterByMinPosts, limitPerAccount } from './limiter';
import { normalizePosts } from './normalizer';
import { resolveClassificationOptions } from './options';
import { calibrateThresholds, computePercentileThreshold } from './percentileCalibrator';
import { partitionByAccount, rankPosts } from './ranker';
import { estimateRollingEngagement } from './rollingEstimator';
import {
  CalibratedThresholds,
  ClassificationOptions,
  LabeledPost,
  LabelSummary,
  RawPostRecord,
} from './types';

export interface EngagementResult {
  posts: LabeledPost[];
  excludedWithoutAccount: number;
  droppedBelowMinPosts: number;
}

export interface ClassificationInput {
  organic: readonly RawPostRecord[];
  ad?: readonly RawPostRecord[];
}

export interface ClassificationResult extends EngagementResult {
  options: ClassificationOptions;
  thresholds: CalibratedThresholds | null;
  summary: LabelSummary;
}

/**
 * normalize -> min-post filter -> rank -> look-ahead estimate -> label -> per-account cap.
 *
 * Output is ordered by account id, then postNumber.
 */
export function computeEngagement(
  records: readonly RawPostRecord[],
  overrides: Partial<ClassificationOptions> = {},
  fallbackThreshold: number | null = null
): EngagementResult {
  const options = resolveClassificationOptions(overrides);

  if (records.length === 0) {
    logger.info('[Classifier] No posts to label');
    return { posts: [], excludedWithoutAccount: 0, droppedBelowMinPosts: 0 };
  }

  const normalized = normalizePosts(records);
  const { partitions, excludedWithoutAccount } = partitionByAccount(normalized);
  if (excludedWithoutAccount > 0) {
    logger.warn(`[Classifier] Excluded ${excludedWithoutAccount} posts without an account id`);
  }

  const eligible = filterByMinPosts(partitions, options.minPostsPerAccount);
  const droppedBelowMinPosts = partitions.posts.length - eligible.posts.length;

  const ranked = rankPosts(eligible);
  const estimated = estimateRollingEngagement(ranked, options.windowSize, options.windowDirection);
  const labeled = labelPosts(estimated.posts, {
    viralMultiplier: options.viralMultiplier,
    missingEstimatePolicy: options.missingEstimatePolicy,
    fallbackThreshold,
  });
  const limited = limitPerAccount(
    { posts: labeled, slices: estimated.slices },
    options.maxPostsPerAccount
  );

  logger.info(
    `[Classifier] Labeled ${labeled.length} posts across ${estimated.slices.length} accounts, kept ${limited.posts.length} (W=${options.windowSize}, x${options.viralMultiplier}, ${options.windowDirection})`
  );

  if (isLevelEnabled('debug')) {
    logger.debug(
      '[Classifier] Labeled rows',
      limited.posts.map(post => ({
        account: post.accountId,
        postNumber: post.postNumber,
        likes: post.likes,
        avgLast50: post.avgLast50,
        viral: post.viral,
      }))
    );
  }

  return { posts: limited.posts, excludedWithoutAccount, droppedBelowMinPosts };
}

/** Back to input shape so a labeled table can be fed through the pipeline again. */
export function stripDerivedFields(post: LabeledPost): RawPostRecord {
  return {
    accountId: post.accountId,
    postId: post.postId,
    postedAt: post.postedAt,
    likes: post.likes,
    views: post.views,
    comments: post.comments,
    duration: post.duration,
    caption: post.caption,
    postUrl: post.postUrl,
  };
}

export function summarizeLabels(posts: readonly LabeledPost[]): LabelSummary {
  const viralPosts = posts.filter(post => post.viral).length;

  return {
    totalPosts: posts.length,
    viralPosts,
    nonViralPosts: posts.length - viralPosts,
    accounts: new Set(posts.map(post => post.accountId)).size,
    postsWithoutEstimate: posts.filter(post => post.avgLast50 === null).length,
  };
}

/**
 * Rolling labels for the organic dataset, plus per-dataset percentile thresholds when an
 * ad dataset is supplied. With `percentile-fallback`, posts the rolling path cannot judge
 * are compared against the organic threshold; otherwise the thresholds are only reported.
 */
export function runClassification(
  input: ClassificationInput,
  overrides: Partial<ClassificationOptions> = {}
): ClassificationResult {
  const options = resolveClassificationOptions(overrides);

  const thresholds = input.ad
    ? calibrateThresholds(normalizePosts(input.ad), normalizePosts(input.organic), options.topFraction)
    : null;

  let fallbackThreshold: number | null = null;
  if (options.missingEstimatePolicy === 'percentile-fallback') {
    const organic =
      thresholds?.organic ??
      computePercentileThreshold(normalizePosts(input.organic), options.topFraction);
    fallbackThreshold = organic.threshold;
    logger.info(`[Classifier] Posts without an estimate fall back to likes >= ${fallbackThreshold ?? 'n/a'}`);
  }

  const result = computeEngagement(input.organic, options, fallbackThreshold);
  const summary = summarizeLabels(result.posts);

  logger.info(
    `[Classifier] Viral: ${summary.viralPosts}, non-viral: ${summary.nonViralPosts}, without estimate: ${summary.postsWithoutEstimate}`
  );

  return { ...result, options, thresholds, summary };
}
