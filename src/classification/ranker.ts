import { AccountPartitions, AccountPost, AccountSlice, NormalizedPost, RankedPost } from './types';

export interface PartitionResult {
  partitions: AccountPartitions<AccountPost>;
  /** Posts dropped because they carry no account id to group by. */
  excludedWithoutAccount: number;
}

function hasAccount(post: NormalizedPost): post is AccountPost {
  return post.accountId !== null;
}

function compareAccountIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Newest first; undated posts go after every dated post of the account
function compareRecency(a: Date | null, b: Date | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b.getTime() - a.getTime();
}

/** Build `[start, end)` slices over an array already grouped by account. */
export function sliceByAccount<T extends { accountId: string }>(posts: T[]): AccountSlice[] {
  const slices: AccountSlice[] = [];
  let start = 0;

  for (let i = 1; i <= posts.length; i++) {
    if (i === posts.length || posts[i].accountId !== posts[start].accountId) {
      if (i > start) {
        slices.push({ accountId: posts[start].accountId, start, end: i });
      }
      start = i;
    }
  }

  return slices;
}

/**
 * Group posts by account into one backing array.
 *
 * Accounts are ordered by id (code-unit order) and posts inside an account newest first.
 * Equal timestamps keep their input order.
 */
export function partitionByAccount(posts: readonly NormalizedPost[]): PartitionResult {
  const withAccount = posts.filter(hasAccount);

  const ordered = withAccount
    .map((post, index) => ({ post, index }))
    .sort(
      (a, b) =>
        compareAccountIds(a.post.accountId, b.post.accountId) ||
        compareRecency(a.post.postedAt, b.post.postedAt) ||
        a.index - b.index
    )
    .map(entry => entry.post);

  return {
    partitions: { posts: ordered, slices: sliceByAccount(ordered) },
    excludedWithoutAccount: posts.length - withAccount.length,
  };
}

/** Assign `postNumber` 1..k inside every slice, 1 being the most recent post. */
export function rankPosts(partitions: AccountPartitions<AccountPost>): AccountPartitions<RankedPost> {
  const ranked: RankedPost[] = new Array(partitions.posts.length);

  for (const slice of partitions.slices) {
    for (let i = slice.start; i < slice.end; i++) {
      ranked[i] = { ...partitions.posts[i], postNumber: i - slice.start + 1 };
    }
  }

  return { posts: ranked, slices: partitions.slices.map(slice => ({ ...slice })) };
}
