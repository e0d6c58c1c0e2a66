import type { Logger } from 'pino';
import {
  FilterOption,
  hasOption,
  type CosmeticFilter,
  type NetworkFilter,
  type ScriptletFilter,
} from '../models/filter.js';
import { BoundedCache } from './cache.js';
import { DomainIndex } from './domain-index.js';
import type { EngineCacheStats, ParsedFilterList, RequestMatchResult } from './types.js';

/**
 * One immutable generation of the loaded filter set. A reload builds a new
 * snapshot and the engine swaps it in with a single assignment, so a lookup
 * always sees one consistent (filters, index, caches) triple.
 *
 * The domain index is built on first use; the caches belong to the snapshot
 * and are dropped together with it.
 */
export class FilterSnapshot {
  readonly networkFilters: readonly NetworkFilter[];
  readonly cosmeticFilters: readonly CosmeticFilter[];
  readonly scriptletFilters: readonly ScriptletFilter[];
  // Filters removed by $badfilter, including the $badfilter rules themselves
  readonly badfilteredCount: number;

  readonly requestCache: BoundedCache<RequestMatchResult>;
  readonly domainCache: BoundedCache<boolean>;

  private domainIndex?: DomainIndex;
  private readonly flaggedExceptions = new Map<number, readonly NetworkFilter[]>();
  private readonly logger?: Logger;

  private constructor(
    network: NetworkFilter[],
    cosmetic: CosmeticFilter[],
    scriptlets: ScriptletFilter[],
    badfilteredCount: number,
    cacheCapacity: number,
    logger?: Logger
  ) {
    this.networkFilters = network;
    this.cosmeticFilters = cosmetic;
    this.scriptletFilters = scriptlets;
    this.badfilteredCount = badfilteredCount;
    this.requestCache = new BoundedCache<RequestMatchResult>(cacheCapacity);
    this.domainCache = new BoundedCache<boolean>(cacheCapacity);
    this.logger = logger;
  }

  static build(
    lists: Iterable<ParsedFilterList>,
    cacheCapacity: number,
    logger?: Logger
  ): FilterSnapshot {
    const network: NetworkFilter[] = [];
    const cosmetic: CosmeticFilter[] = [];
    const scriptlets: ScriptletFilter[] = [];

    for (const list of lists) {
      network.push(...list.network);
      cosmetic.push(...list.cosmetic);
      scriptlets.push(...list.scriptlets);
    }

    const badfilterKeys = new Set<string>();
    for (const filter of network) {
      if (hasOption(filter.options, FilterOption.Badfilter)) {
        badfilterKeys.add(filter.badfilterKey);
      }
    }

    const active =
      badfilterKeys.size === 0
        ? network
        : network.filter(
            (f) => !hasOption(f.options, FilterOption.Badfilter) && !badfilterKeys.has(f.badfilterKey)
          );

    return new FilterSnapshot(
      active,
      cosmetic,
      scriptlets,
      network.length - active.length,
      cacheCapacity,
      logger
    );
  }

  static empty(cacheCapacity: number, logger?: Logger): FilterSnapshot {
    return FilterSnapshot.build([], cacheCapacity, logger);
  }

  get index(): DomainIndex {
    if (!this.domainIndex) {
      this.domainIndex = DomainIndex.build(this.networkFilters);
      this.logger?.debug(
        {
          filters: this.networkFilters.length,
          domains: this.domainIndex.domainCount,
          indexed: this.domainIndex.indexedCount,
          generic: this.domainIndex.generic.length,
        },
        'Domain index built'
      );
    }
    return this.domainIndex;
  }

  /**
   * Exception filters carrying a page-level option ($generichide,
   * $genericblock). Computed once per option.
   */
  exceptionsWithOption(flag: number): readonly NetworkFilter[] {
    let filters = this.flaggedExceptions.get(flag);
    if (!filters) {
      filters = this.networkFilters.filter((f) => f.isException && hasOption(f.options, flag));
      this.flaggedExceptions.set(flag, filters);
    }
    return filters;
  }

  get isIndexed(): boolean {
    return this.domainIndex !== undefined;
  }

  clearCaches(): void {
    this.requestCache.clear();
    this.domainCache.clear();
  }

  cacheStats(): EngineCacheStats {
    return {
      requests: this.requestCache.stats(),
      domains: this.domainCache.stats(),
    };
  }
}
