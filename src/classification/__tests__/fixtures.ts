import { RawPostRecord } from '../types';

export function dayOf(day: number): Date {
  return new Date(Date.UTC(2024, 0, day, 12));
}

/** One post per day starting at `firstDay`; `likes[i]` belongs to day `firstDay + i`. */
export function buildAccount(accountId: string, likes: readonly number[], firstDay = 1): RawPostRecord[] {
  return likes.map((count, i) => ({
    accountId,
    postId: `${accountId}-${firstDay + i}`,
    postedAt: dayOf(firstDay + i),
    likes: count,
    views: count * 10,
    comments: 1,
    duration: 15,
    caption: `day ${firstDay + i}`,
  }));
}

export function repeat(value: number, times: number): number[] {
  return Array.from({ length: times }, () => value);
}
