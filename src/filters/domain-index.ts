import type { NetworkFilter } from '../models/filter.js';

const EMPTY_BUCKET: readonly number[] = [];

/**
 * Network filter indices grouped by anchor hostname. Every index lands in
 * exactly one place: its hostname bucket, or the generic list checked for
 * every request.
 */
export class DomainIndex {
  private readonly buckets: ReadonlyMap<string, readonly number[]>;
  readonly generic: readonly number[];

  private constructor(buckets: Map<string, number[]>, generic: number[]) {
    this.buckets = buckets;
    this.generic = generic;
  }

  static build(filters: readonly NetworkFilter[]): DomainIndex {
    const buckets = new Map<string, number[]>();
    const generic: number[] = [];

    for (let i = 0; i < filters.length; i++) {
      const domain = filters[i].anchorDomain;
      if (domain === undefined) {
        generic.push(i);
        continue;
      }

      const bucket = buckets.get(domain);
      if (bucket) {
        bucket.push(i);
      } else {
        buckets.set(domain, [i]);
      }
    }

    return new DomainIndex(buckets, generic);
  }

  lookup(host: string): readonly number[] {
    return this.buckets.get(host) ?? EMPTY_BUCKET;
  }

  /**
   * Bucket for `host` merged with the generic list, in filter-list order.
   */
  candidates(host: string): number[] {
    const bucket = this.lookup(host);
    const merged: number[] = [];
    let b = 0;
    let g = 0;

    while (b < bucket.length || g < this.generic.length) {
      if (g >= this.generic.length || (b < bucket.length && bucket[b] < this.generic[g])) {
        merged.push(bucket[b++]);
      } else {
        merged.push(this.generic[g++]);
      }
    }

    return merged;
  }

  get domainCount(): number {
    return this.buckets.size;
  }

  get indexedCount(): number {
    let count = 0;
    for (const bucket of this.buckets.values()) {
      count += bucket.length;
    }
    return count;
  }
}
