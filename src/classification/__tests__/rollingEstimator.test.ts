import { describe, test, expect } from '@jest/globals';
import { normalizePosts } from '../normalizer';
import { partitionByAccount, rankPosts } from '../ranker';
import { CompensatedSum, estimateRollingEngagement, lookAheadMeans } from '../rollingEstimator';
import { RawPostRecord, WindowDirection } from '../types';
import { buildAccount, repeat } from './fixtures';

function estimate(records: RawPostRecord[], windowSize: number, direction?: WindowDirection) {
  const { partitions } = partitionByAccount(normalizePosts(records));
  return estimateRollingEngagement(rankPosts(partitions), windowSize, direction).posts;
}

// ============================================
// WINDOW KERNEL
// ============================================

describe('lookAheadMeans', () => {
  test('averages the values strictly after each index', () => {
    expect(lookAheadMeans([1, 2, 3, 4, 5], 2)).toEqual([2.5, 3.5, 4.5, null, null]);
    expect(lookAheadMeans([1, 2, 3, 4, 5], 4)).toEqual([3.5, null, null, null, null]);
  });

  test('is undefined everywhere when the series is not longer than the window', () => {
    expect(lookAheadMeans([1, 2, 3, 4, 5], 5)).toEqual([null, null, null, null, null]);
    expect(lookAheadMeans([], 3)).toEqual([]);
  });
});

describe('CompensatedSum', () => {
  test('keeps small values that a plain sum would lose', () => {
    const sum = new CompensatedSum();
    sum.add(1e16);
    sum.add(1);
    sum.add(-1e16);
    expect(sum.value()).toBe(1);
  });
});

// ============================================
// PER-ACCOUNT ESTIMATES
// ============================================

describe('estimateRollingEngagement', () => {
  // Day 1 has 51 likes, day 51 (the newest post) has 1
  const alice = buildAccount('alice', Array.from({ length: 51 }, (_, i) => 51 - i));

  test('only the oldest post of a 51-post account has a window looking toward recent posts', () => {
    const posts = estimate(alice, 50);
    const oldest = posts.find(p => p.postNumber === 51);

    expect(oldest?.postId).toBe('alice-1');
    expect(oldest?.avgLast50).toBe(25.5);
    expect(posts.filter(p => p.avgLast50 !== null)).toHaveLength(1);
  });

  test('only the newest post has a window when looking toward older posts', () => {
    const posts = estimate(alice, 50, 'toward-older');
    const newest = posts.find(p => p.postNumber === 1);

    expect(newest?.postId).toBe('alice-51');
    // mean of likes on days 50..1 = mean(2..51)
    expect(newest?.avgLast50).toBe(26.5);
    expect(posts.filter(p => p.avgLast50 !== null)).toHaveLength(1);
  });

  test('a flat 60-post account estimates exactly 100 for the ten oldest posts', () => {
    const posts = estimate(buildAccount('flat', repeat(100, 60)), 50);
    const defined = posts.filter(p => p.avgLast50 !== null);

    expect(defined.map(p => p.postNumber)).toEqual([51, 52, 53, 54, 55, 56, 57, 58, 59, 60]);
    expect(defined.every(p => p.avgLast50 === 100)).toBe(true);
  });

  test('a flat 60-post account estimates exactly 100 for post numbers 1..10 looking toward older posts', () => {
    const posts = estimate(buildAccount('flat', repeat(100, 60)), 50, 'toward-older');
    const defined = posts.filter(p => p.avgLast50 !== null);

    expect(defined.map(p => p.postNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(defined.every(p => p.avgLast50 === 100)).toBe(true);
  });

  test('accounts with at most W posts get no estimate at all', () => {
    const posts = estimate(buildAccount('short', repeat(7, 50)), 50);
    expect(posts.every(p => p.avgLast50 === null)).toBe(true);
  });

  test('windows never cross account boundaries', () => {
    const posts = estimate(
      [...buildAccount('a', [1, 2, 3]), ...buildAccount('b', [100, 200, 300])],
      2
    );

    // Oldest post of each account averages its two newer siblings only
    expect(posts.map(p => [p.accountId, p.postNumber, p.avgLast50])).toEqual([
      ['a', 1, null],
      ['a', 2, null],
      ['a', 3, 2.5],
      ['b', 1, null],
      ['b', 2, null],
      ['b', 3, 250],
    ]);
  });

  test('estimates for one account do not depend on other accounts or input order', () => {
    const carol = buildAccount('carol', [4, 8, 15, 16, 23, 42, 7, 9]);
    const alone = estimate(carol, 3);
    const mixed = estimate([...buildAccount('zed', [1, 1, 1, 1]), ...[...carol].reverse()], 3);

    expect(mixed.filter(p => p.accountId === 'carol')).toEqual(alone);
  });
});
