import { DEFAULT_MISSING_ESTIMATE_POLICY, DEFAULT_VIRAL_MULTIPLIER } from './options';
import { EstimatedPost, LabeledPost, MissingEstimatePolicy } from './types';

export interface LabelOptions {
  viralMultiplier?: number;
  missingEstimatePolicy?: MissingEstimatePolicy;
  /** Percentile threshold on likes used by `percentile-fallback`. */
  fallbackThreshold?: number | null;
}

export function labelPost(post: EstimatedPost, options: LabelOptions = {}): LabeledPost {
  const multiplier = options.viralMultiplier ?? DEFAULT_VIRAL_MULTIPLIER;
  const policy = options.missingEstimatePolicy ?? DEFAULT_MISSING_ESTIMATE_POLICY;
  const fallbackThreshold = options.fallbackThreshold ?? null;

  if (post.avgLast50 !== null) {
    return { ...post, viral: post.likes > post.avgLast50 * multiplier, labelSource: 'rolling' };
  }

  if (policy === 'percentile-fallback' && fallbackThreshold !== null) {
    return { ...post, viral: post.likes >= fallbackThreshold, labelSource: 'percentile' };
  }

  return { ...post, viral: false, labelSource: 'none' };
}

export function labelPosts(posts: readonly EstimatedPost[], options: LabelOptions = {}): LabeledPost[] {
  return posts.map(post => labelPost(post, options));
}
