import { AccountPartitions } from './types';
import { sliceByAccount } from './ranker';

function keepSlices<T extends { accountId: string }>(
  partitions: AccountPartitions<T>,
  take: (length: number) => number
): AccountPartitions<T> {
  const kept: T[] = [];

  for (const slice of partitions.slices) {
    const count = Math.min(take(slice.end - slice.start), slice.end - slice.start);
    for (let i = slice.start; i < slice.start + count; i++) {
      kept.push(partitions.posts[i]);
    }
  }

  return { posts: kept, slices: sliceByAccount(kept) };
}

/** Drop whole accounts with fewer than `minPosts` posts. Runs before ranking. */
export function filterByMinPosts<T extends { accountId: string }>(
  partitions: AccountPartitions<T>,
  minPosts: number
): AccountPartitions<T> {
  return keepSlices(partitions, length => (length >= minPosts ? length : 0));
}

/**
 * Keep the first `maxPosts` posts of every account in slice order.
 * After ranking that is `postNumber <= maxPosts`, i.e. the most recent posts.
 */
export function limitPerAccount<T extends { accountId: string }>(
  partitions: AccountPartitions<T>,
  maxPosts: number
): AccountPartitions<T> {
  return keepSlices(partitions, () => maxPosts);
}
