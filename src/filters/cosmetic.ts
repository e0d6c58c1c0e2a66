import { FilterOption } from '../models/filter.js';
import { matchesDomainLists } from './domains.js';
import { matchPattern } from './pattern.js';
import type { FilterSnapshot } from './snapshot.js';

/**
 * True when a $generichide exception covers the document at `host`.
 */
function isGenericHideDisabled(snapshot: FilterSnapshot, host: string): boolean {
  const exceptions = snapshot.exceptionsWithOption(FilterOption.GenericHide);
  if (exceptions.length === 0) {
    return false;
  }

  const documentUrl = `https://${host}/`;
  return exceptions.some(
    (filter) =>
      matchesDomainLists(host, filter.domainsInclude, filter.domainsExclude) &&
      matchPattern(filter.pattern, documentUrl)
  );
}

/**
 * Selectors to hide on `host`, in list order and without duplicates.
 * "#@#" exceptions suppress the same selector on the domains they name.
 */
export function selectCosmeticSelectors(snapshot: FilterSnapshot, host: string): string[] {
  const suppressed = new Set<string>();
  for (const filter of snapshot.cosmeticFilters) {
    if (filter.isException && matchesDomainLists(host, filter.domainsInclude, filter.domainsExclude)) {
      suppressed.add(filter.selector);
    }
  }

  const skipGeneric = isGenericHideDisabled(snapshot, host);
  const selectors: string[] = [];
  const seen = new Set<string>();

  for (const filter of snapshot.cosmeticFilters) {
    if (filter.isException) continue;
    if (filter.isGeneric && skipGeneric) continue;
    if (suppressed.has(filter.selector) || seen.has(filter.selector)) continue;

    if (matchesDomainLists(host, filter.domainsInclude, filter.domainsExclude)) {
      seen.add(filter.selector);
      selectors.push(filter.selector);
    }
  }

  return selectors;
}

export function selectScriptlets(snapshot: FilterSnapshot, host: string): string[] {
  const suppressed = new Set<string>();
  for (const filter of snapshot.scriptletFilters) {
    if (filter.isException && matchesDomainLists(host, filter.domainsInclude, filter.domainsExclude)) {
      suppressed.add(filter.body);
    }
  }

  const scriptlets: string[] = [];
  for (const filter of snapshot.scriptletFilters) {
    if (filter.isException || suppressed.has(filter.body) || scriptlets.includes(filter.body)) {
      continue;
    }
    if (matchesDomainLists(host, filter.domainsInclude, filter.domainsExclude)) {
      scriptlets.push(filter.body);
    }
  }

  return scriptlets;
}
