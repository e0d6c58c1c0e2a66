import type { CosmeticFilter, NetworkFilter, RequestType, ScriptletFilter } from '../models/filter.js';

export interface FilterLineError {
  line: number;
  text: string;
  error: string;
}

export interface ParsedFilterList {
  network: NetworkFilter[];
  cosmetic: CosmeticFilter[];
  scriptlets: ScriptletFilter[];
  errors: FilterLineError[];
}

export interface FilterListLoadResult {
  name: string;
  networkCount: number;
  cosmeticCount: number;
  scriptletCount: number;
  errorCount: number;
  errors: FilterLineError[];
}

export interface FilterListSummary {
  name: string;
  networkCount: number;
  cosmeticCount: number;
  scriptletCount: number;
  errorCount: number;
  loadedAt: Date;
}

export interface RequestContext {
  url: string;
  type: RequestType;
  originDomain?: string;
}

export interface RequestMatchResult {
  readonly blocked: boolean;
  // Text of the first blocking filter that matched
  readonly filter?: string;
  // Text of the first exception filter that matched
  readonly exception?: string;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  clears: number;
}

export interface EngineCacheStats {
  requests: CacheStats;
  domains: CacheStats;
}

/**
 * A single rule could not be parsed. The line is skipped, the list load
 * continues.
 */
export class FilterSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterSyntaxError';
  }
}

/**
 * A whole list was rejected. The previously loaded filter set is kept.
 */
export class FilterListError extends Error {
  readonly listName: string;

  constructor(listName: string, message: string) {
    super(message);
    this.name = 'FilterListError';
    this.listName = listName;
  }
}
