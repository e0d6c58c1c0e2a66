import type { Logger } from 'pino';
import type { RequestType } from '../models/filter.js';
import { DEFAULT_CACHE_CAPACITY } from './cache.js';
import { selectCosmeticSelectors, selectScriptlets } from './cosmetic.js';
import { DEFAULT_FILTER_LIST, DEFAULT_FILTER_LIST_NAME } from './default-list.js';
import { normalizeHostname } from './domains.js';
import {
  buildRequestInfo,
  collectRemoveParams,
  findRedirectResource,
  matchNetworkRequest,
  type RequestInfo,
} from './matcher.js';
import { parseFilterList } from './parser.js';
import { FilterSnapshot } from './snapshot.js';
import { FilterStatistics, type StatisticsSnapshot } from './statistics.js';
import {
  FilterListError,
  type EngineCacheStats,
  type FilterListLoadResult,
  type FilterListSummary,
  type ParsedFilterList,
  type RequestMatchResult,
} from './types.js';

export const DEFAULT_MAX_RULES_PER_LIST = 500_000;

export interface ContentFilterEngineOptions {
  enabled?: boolean;
  cacheCapacity?: number;
  maxRulesPerList?: number;
}

interface LoadedFilterList {
  parsed: ParsedFilterList;
  loadedAt: Date;
}

function ruleCount(parsed: ParsedFilterList): number {
  return parsed.network.length + parsed.cosmetic.length + parsed.scriptlets.length;
}

export class ContentFilterEngine {
  private enabled: boolean;
  private lists = new Map<string, LoadedFilterList>();
  private snapshot: FilterSnapshot;
  private readonly statistics = new FilterStatistics();
  private readonly cacheCapacity: number;
  private readonly maxRulesPerList: number;
  private readonly logger: Logger;

  constructor(options: ContentFilterEngineOptions, logger: Logger) {
    this.enabled = options.enabled ?? true;
    this.cacheCapacity = options.cacheCapacity ?? DEFAULT_CACHE_CAPACITY;
    this.maxRulesPerList = options.maxRulesPerList ?? DEFAULT_MAX_RULES_PER_LIST;
    this.logger = logger;
    this.snapshot = FilterSnapshot.empty(this.cacheCapacity, logger);
  }

  isFilteringEnabled(): boolean {
    return this.enabled;
  }

  setFilteringEnabled(enabled: boolean): void {
    if (this.enabled === enabled) {
      return;
    }
    this.enabled = enabled;
    this.snapshot.clearCaches();
    this.logger.info({ enabled }, 'Content filtering toggled');
  }

  /**
   * Parse `text` and publish it under `name`, replacing a list of the same
   * name or appending a new one. Either the whole list is applied or the
   * current filter set is left untouched.
   */
  loadFilterList(name: string, text: string): FilterListLoadResult {
    const listName = name.trim();
    if (!listName) {
      throw new FilterListError(name, 'Filter list name must not be empty');
    }

    let parsed: ParsedFilterList;
    try {
      parsed = parseFilterList(text);
    } catch (err) {
      this.logger.error({ err, list: listName }, 'Failed to parse filter list');
      throw err;
    }

    const rules = ruleCount(parsed);
    if (rules > this.maxRulesPerList) {
      this.logger.error(
        { list: listName, rules, maxRules: this.maxRulesPerList },
        'Filter list rejected: too many rules'
      );
      throw new FilterListError(
        listName,
        `Filter list "${listName}" has ${rules} rules, limit is ${this.maxRulesPerList}`
      );
    }

    for (const { line, text: ruleText, error } of parsed.errors) {
      this.logger.debug({ list: listName, line, rule: ruleText, error }, 'Skipped malformed filter');
    }

    const lists = new Map(this.lists);
    lists.set(listName, { parsed, loadedAt: new Date() });
    this.publish(lists);

    const result: FilterListLoadResult = {
      name: listName,
      networkCount: parsed.network.length,
      cosmeticCount: parsed.cosmetic.length,
      scriptletCount: parsed.scriptlets.length,
      errorCount: parsed.errors.length,
      errors: parsed.errors,
    };

    this.logger.info(
      {
        list: listName,
        network: result.networkCount,
        cosmetic: result.cosmeticCount,
        scriptlets: result.scriptletCount,
        errors: result.errorCount,
      },
      'Filter list loaded'
    );

    return result;
  }

  loadDefaultFilterList(): FilterListLoadResult {
    return this.loadFilterList(DEFAULT_FILTER_LIST_NAME, DEFAULT_FILTER_LIST);
  }

  removeFilterList(name: string): boolean {
    const listName = name.trim();
    if (!this.lists.has(listName)) {
      return false;
    }

    const lists = new Map(this.lists);
    lists.delete(listName);
    this.publish(lists);
    this.logger.info({ list: listName }, 'Filter list removed');
    return true;
  }

  clearFilterLists(): void {
    this.publish(new Map());
    this.statistics.reset();
    this.logger.info('All filter lists cleared');
  }

  getFilterLists(): FilterListSummary[] {
    return [...this.lists].map(([name, { parsed, loadedAt }]) => ({
      name,
      networkCount: parsed.network.length,
      cosmeticCount: parsed.cosmetic.length,
      scriptletCount: parsed.scriptlets.length,
      errorCount: parsed.errors.length,
      loadedAt,
    }));
  }

  /**
   * Build the next snapshot off to the side, then swap it in.
   */
  private publish(lists: Map<string, LoadedFilterList>): void {
    const snapshot = FilterSnapshot.build(
      [...lists.values()].map((l) => l.parsed),
      this.cacheCapacity,
      this.logger
    );
    this.lists = lists;
    this.snapshot = snapshot;

    if (snapshot.badfilteredCount > 0) {
      this.logger.debug({ disabled: snapshot.badfilteredCount }, 'Filters disabled by $badfilter');
    }
  }

  private resolveRequest(url: string, type: RequestType, originDomain?: string): RequestInfo | null {
    const req = buildRequestInfo({ url, type, originDomain });
    if (!req) {
      this.logger.debug({ url, type }, 'Unparseable request URL, not filtering');
    }
    return req;
  }

  shouldBlockRequest(url: string, type: RequestType, originDomain?: string): boolean {
    return this.matchRequest(url, type, originDomain).blocked;
  }

  /**
   * Block decision with the filters that made it, cached per snapshot.
   */
  matchRequest(url: string, type: RequestType, originDomain?: string): RequestMatchResult {
    if (!this.enabled) {
      return { blocked: false };
    }

    const snapshot = this.snapshot;
    const origin = originDomain ? normalizeHostname(originDomain) : '';
    // Parts are JSON-encoded so no (origin, url) pair can collide with another
    const cacheKey = JSON.stringify([type, origin, url]);
    const cached = snapshot.requestCache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const req = this.resolveRequest(url, type, originDomain);
    if (!req) {
      return { blocked: false };
    }

    const result = matchNetworkRequest(snapshot, req);
    snapshot.requestCache.set(cacheKey, result);
    return result;
  }

  getRedirectResource(url: string, type: RequestType, originDomain?: string): string | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const req = this.resolveRequest(url, type, originDomain);
    return req ? findRedirectResource(this.snapshot, req) : undefined;
  }

  getRemoveParams(url: string, type: RequestType, originDomain?: string): string[] {
    if (!this.enabled) {
      return [];
    }

    const req = this.resolveRequest(url, type, originDomain);
    return req ? collectRemoveParams(this.snapshot, req) : [];
  }

  getCosmeticSelectors(domain: string): string[] {
    if (!this.enabled) {
      return [];
    }

    const host = normalizeHostname(domain);
    if (!host) {
      return [];
    }

    const snapshot = this.snapshot;
    if (snapshot.domainCache.get(host) === false) {
      return [];
    }

    const selectors = selectCosmeticSelectors(snapshot, host);
    snapshot.domainCache.set(host, selectors.length > 0);
    return selectors;
  }

  getScriptlets(domain: string): string[] {
    if (!this.enabled) {
      return [];
    }

    const host = normalizeHostname(domain);
    return host ? selectScriptlets(this.snapshot, host) : [];
  }

  get blockedRequestsCount(): number {
    return this.statistics.blockedRequestsCount;
  }

  get blockedElementsCount(): number {
    return this.statistics.blockedElementsCount;
  }

  incrementBlockedRequestCount(): void {
    this.statistics.incrementBlockedRequestCount();
  }

  incrementBlockedElementCount(count: number = 1): void {
    this.statistics.incrementBlockedElementCount(count);
  }

  resetStatistics(): void {
    this.statistics.reset();
  }

  getStatistics(): StatisticsSnapshot {
    return this.statistics.toJSON();
  }

  getCacheStats(): EngineCacheStats {
    return this.snapshot.cacheStats();
  }

  /**
   * Filter counts of the published snapshot, after $badfilter removal.
   */
  getFilterCounts(): { network: number; cosmetic: number; scriptlets: number; indexed: boolean } {
    const snapshot = this.snapshot;
    return {
      network: snapshot.networkFilters.length,
      cosmetic: snapshot.cosmeticFilters.length,
      scriptlets: snapshot.scriptletFilters.length,
      indexed: snapshot.isIndexed,
    };
  }
}

export * from './types.js';
export { DEFAULT_FILTER_LIST_NAME } from './default-list.js';
export { stripQueryParams } from './matcher.js';
