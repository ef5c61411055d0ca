import { NoSuitableArtifactError } from "../core/errors.js";

export type DigestEntry = {
  timestamp: Date;
  digest: string;
};

/**
 * Time-ordered (timestamp, digest) pairs with nearest-earlier lookup.
 *
 * Entries must be added in non-decreasing timestamp order; the index does not
 * sort. Fed out of order it still answers, but the answer is unspecified.
 */
export class DigestIndex {
  private readonly times: number[] = [];
  private readonly digests: string[] = [];

  static fromEntries(entries: Iterable<DigestEntry>): DigestIndex {
    const index = new DigestIndex();
    for (const e of entries) index.addEntry(e.timestamp, e.digest);
    return index;
  }

  get size(): number {
    return this.times.length;
  }

  addEntry(timestamp: Date, digest: string): void {
    this.times.push(timestamp.getTime());
    this.digests.push(digest);
  }

  /**
   * Digest of the entry with the greatest timestamp ≤ `query`. Among equal
   * timestamps the one added last wins.
   * @throws NoSuitableArtifactError when every entry is later than `query`.
   */
  findLatestBefore(query: Date): string {
    const index = this.insertionPointRight(query.getTime());
    if (index === 0) throw new NoSuitableArtifactError(query);
    return this.digests[index - 1];
  }

  /** First position whose timestamp is strictly greater than `t`. */
  private insertionPointRight(t: number): number {
    let lo = 0;
    let hi = this.times.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (t < this.times[mid]) hi = mid;
      else lo = mid + 1;
    }
    return lo;
  }
}
