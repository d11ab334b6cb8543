import { AccountPartitions, EstimatedPost, RankedPost, WindowDirection } from './types';

/** Neumaier-compensated running sum; a sliding window adds and removes values many times. */
export class CompensatedSum {
  private sum = 0;
  private compensation = 0;

  add(value: number): void {
    const total = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += this.sum - total + value;
    } else {
      this.compensation += value - total + this.sum;
    }
    this.sum = total;
  }

  value(): number {
    return this.sum + this.compensation;
  }
}

/**
 * For every index i, the mean of `values[i + 1 .. i + windowSize]`.
 * `null` where fewer than `windowSize` values follow i.
 */
export function lookAheadMeans(values: readonly number[], windowSize: number): Array<number | null> {
  const n = values.length;
  const means: Array<number | null> = new Array(n).fill(null);
  const lastDefined = n - 1 - windowSize;
  if (lastDefined < 0) return means;

  const window = new CompensatedSum();
  for (let j = lastDefined + 1; j < n; j++) {
    window.add(values[j]);
  }
  means[lastDefined] = window.value() / windowSize;

  // Slide toward the front: the window for i gains i+1 and loses i+1+windowSize
  for (let i = lastDefined - 1; i >= 0; i--) {
    window.add(values[i + 1]);
    window.add(-values[i + 1 + windowSize]);
    means[i] = window.value() / windowSize;
  }

  return means;
}

/**
 * Attach `avgLast50` to every ranked post.
 *
 * Slices arrive in rank order (postNumber 1 = newest first). With `toward-recent`,
 * the account is walked oldest to newest and each post looks at the W posts published
 * after it, so the W newest posts get no estimate. With `toward-older`, the walk follows
 * rank order and each post looks at the W posts published before it.
 */
export function estimateRollingEngagement(
  partitions: AccountPartitions<RankedPost>,
  windowSize: number,
  direction: WindowDirection = 'toward-recent'
): AccountPartitions<EstimatedPost> {
  const estimated: EstimatedPost[] = new Array(partitions.posts.length);

  for (const slice of partitions.slices) {
    const ranked = partitions.posts.slice(slice.start, slice.end);
    const traversal = direction === 'toward-recent' ? [...ranked].reverse() : ranked;
    const means = lookAheadMeans(
      traversal.map(post => post.likes),
      windowSize
    );

    traversal.forEach((post, i) => {
      // postNumber is 1-based rank order, which places the post back in its slice
      estimated[slice.start + post.postNumber - 1] = { ...post, avgLast50: means[i] };
    });
  }

  return { posts: estimated, slices: partitions.slices.map(slice => ({ ...slice })) };
}
