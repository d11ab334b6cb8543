import { describe, test, expect } from '@jest/globals';
import { labelPost, labelPosts } from '../labeler';
import { EstimatedPost } from '../types';

function post(likes: number, avgLast50: number | null): EstimatedPost {
  return {
    accountId: 'alice',
    postId: `p-${likes}`,
    postedAt: new Date(Date.UTC(2024, 0, 1)),
    likes,
    views: 0,
    comments: 0,
    duration: 0,
    caption: '',
    postUrl: null,
    postNumber: 1,
    avgLast50,
  };
}

describe('labelPost', () => {
  test('marks posts above 1.15x their baseline as viral', () => {
    expect(labelPost(post(116, 100))).toMatchObject({ viral: true, labelSource: 'rolling' });
    expect(labelPost(post(114, 100))).toMatchObject({ viral: false, labelSource: 'rolling' });
    expect(labelPost(post(100, 100))).toMatchObject({ viral: false, labelSource: 'rolling' });
  });

  test('honours a custom multiplier', () => {
    expect(labelPost(post(150, 100), { viralMultiplier: 2 }).viral).toBe(false);
    expect(labelPost(post(201, 100), { viralMultiplier: 2 }).viral).toBe(true);
  });

  test('treats a missing estimate as non-viral by default', () => {
    expect(labelPost(post(1000000, null))).toMatchObject({ viral: false, labelSource: 'none' });
  });

  test('falls back to the percentile threshold when asked to', () => {
    const options = { missingEstimatePolicy: 'percentile-fallback' as const, fallbackThreshold: 500 };

    expect(labelPost(post(500, null), options)).toMatchObject({ viral: true, labelSource: 'percentile' });
    expect(labelPost(post(499, null), options)).toMatchObject({ viral: false, labelSource: 'percentile' });
    // A defined estimate still wins
    expect(labelPost(post(600, 1000), options)).toMatchObject({ viral: false, labelSource: 'rolling' });
  });

  test('cannot fall back without a threshold', () => {
    const labeled = labelPost(post(900, null), {
      missingEstimatePolicy: 'percentile-fallback',
      fallbackThreshold: null,
    });
    expect(labeled).toMatchObject({ viral: false, labelSource: 'none' });
  });

  test('keeps the estimate and original fields', () => {
    const [labeled] = labelPosts([post(116, 100)]);
    expect(labeled.avgLast50).toBe(100);
    expect(labeled.postId).toBe('p-116');
  });
});
