/**
 * Record shapes flowing through the engagement classification engine.
 *
 * Each stage returns new objects; nothing upstream is mutated.
 */

/** A post as handed over by a scraper or dataset loader. Every field is untrusted. */
export interface RawPostRecord {
  accountId?: unknown;
  postId?: unknown;
  postedAt?: unknown;
  likes?: unknown;
  views?: unknown;
  comments?: unknown;
  duration?: unknown;
  caption?: unknown;
  postUrl?: unknown;
}

export interface NormalizedPost {
  accountId: string | null;
  postId: string | null;
  /** `null` when the raw value could not be parsed. */
  postedAt: Date | null;
  likes: number;
  views: number;
  comments: number;
  duration: number;
  caption: string;
  postUrl: string | null;
}

export interface AccountPost extends NormalizedPost {
  accountId: string;
}

export interface RankedPost extends AccountPost {
  /** 1 = most recent within the account. */
  postNumber: number;
}

export interface EstimatedPost extends RankedPost {
  /** Mean likes over the look-ahead window, `null` when the window is short. */
  avgLast50: number | null;
}

export type LabelSource = 'rolling' | 'percentile' | 'none';

export interface LabeledPost extends EstimatedPost {
  viral: boolean;
  labelSource: LabelSource;
}

/** Contiguous slice `[start, end)` of one account's posts inside a shared backing array. */
export interface AccountSlice {
  accountId: string;
  start: number;
  end: number;
}

export interface AccountPartitions<T> {
  posts: T[];
  slices: AccountSlice[];
}

export type NumericField = 'likes' | 'views' | 'comments' | 'duration';

export type EngagementMetric = NumericField | ((post: NormalizedPost) => number);

/**
 * - `toward-recent`: the window is the W posts published after the post
 * - `toward-older`: the window is the W posts published before it
 */
export type WindowDirection = 'toward-recent' | 'toward-older';

export type MissingEstimatePolicy = 'non-viral' | 'percentile-fallback';

export interface ClassificationOptions {
  windowSize: number;
  viralMultiplier: number;
  maxPostsPerAccount: number;
  minPostsPerAccount: number;
  topFraction: number;
  windowDirection: WindowDirection;
  missingEstimatePolicy: MissingEstimatePolicy;
}

export interface PercentileThreshold {
  threshold: number | null;
  sampleSize: number;
  topCount: number;
}

export interface CalibratedThresholds {
  ad: PercentileThreshold;
  organic: PercentileThreshold;
}

export interface LabelSummary {
  totalPosts: number;
  viralPosts: number;
  nonViralPosts: number;
  accounts: number;
  postsWithoutEstimate: number;
}
