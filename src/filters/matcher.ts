import {
  FilterOption,
  TYPE_OPTION_MASK,
  hasOption,
  requestTypeBit,
  type NetworkFilter,
  type RequestType,
} from '../models/filter.js';
import { isThirdPartyRequest, matchesDomainLists, normalizeHostname, parseRequestUrl } from './domains.js';
import { matchPattern } from './pattern.js';
import type { FilterSnapshot } from './snapshot.js';
import type { RequestContext, RequestMatchResult } from './types.js';

// Filters that modify a request or page instead of blocking it
const MODIFIER_MASK =
  FilterOption.RemoveParam |
  FilterOption.RedirectRule |
  FilterOption.Header |
  FilterOption.Popup |
  FilterOption.GenericHide |
  FilterOption.GenericBlock;

export interface RequestInfo {
  href: string;
  lowerHref: string;
  hostname: string;
  type: RequestType;
  originHost?: string;
  thirdParty: boolean;
  // Host that domain= constraints are checked against
  constraintHost: string;
}

/**
 * Resolve a request context. Returns null when the URL cannot be parsed.
 */
export function buildRequestInfo(ctx: RequestContext): RequestInfo | null {
  const url = parseRequestUrl(ctx.url);
  if (!url) {
    return null;
  }

  const originHost = ctx.originDomain ? normalizeHostname(ctx.originDomain) : undefined;

  return {
    href: url.href,
    lowerHref: url.href.toLowerCase(),
    hostname: url.hostname,
    type: ctx.type,
    originHost: originHost || undefined,
    thirdParty: originHost ? isThirdPartyRequest(url.hostname, originHost) : false,
    constraintHost: originHost || url.hostname,
  };
}

function matchesRequestType(filter: NetworkFilter, type: RequestType): boolean {
  const types = filter.options & TYPE_OPTION_MASK;
  if (types === 0) {
    return true;
  }
  return (types & requestTypeBit(type)) !== 0;
}

/**
 * Type, party, domain= and URL checks, cheapest first.
 */
export function isFilterApplicable(filter: NetworkFilter, req: RequestInfo): boolean {
  if (!matchesRequestType(filter, req.type)) {
    return false;
  }

  if (hasOption(filter.options, FilterOption.ThirdParty) && !req.thirdParty) {
    return false;
  }
  if (hasOption(filter.options, FilterOption.FirstParty) && req.thirdParty) {
    return false;
  }

  if (!matchesDomainLists(req.constraintHost, filter.domainsInclude, filter.domainsExclude)) {
    return false;
  }

  const url = hasOption(filter.options, FilterOption.MatchCase) ? req.href : req.lowerHref;
  return matchPattern(filter.pattern, url);
}

function isModifier(filter: NetworkFilter): boolean {
  return hasOption(filter.options, MODIFIER_MASK) || filter.csp !== undefined;
}

/**
 * Exceptions that carry their own semantics ($generichide, $removeparam,
 * $redirect=...) do not allow the request as a whole.
 */
function isPlainException(filter: NetworkFilter): boolean {
  return filter.isException && !isModifier(filter) && !hasOption(filter.options, FilterOption.Redirect);
}

function isBlockingFilter(filter: NetworkFilter): boolean {
  return !filter.isException && !isModifier(filter);
}

function* applicableFilters(snapshot: FilterSnapshot, req: RequestInfo): Generator<NetworkFilter> {
  const filters = snapshot.networkFilters;
  for (const index of snapshot.index.candidates(req.hostname)) {
    const filter = filters[index];
    if (isFilterApplicable(filter, req)) {
      yield filter;
    }
  }
}

/**
 * True when the origin document is covered by a $genericblock exception.
 */
function isGenericBlockDisabled(snapshot: FilterSnapshot, req: RequestInfo): boolean {
  if (!req.originHost) {
    return false;
  }

  const exceptions = snapshot.exceptionsWithOption(FilterOption.GenericBlock);
  if (exceptions.length === 0) {
    return false;
  }

  const documentUrl = `https://${req.originHost}/`;
  return exceptions.some(
    (filter) =>
      matchesDomainLists(req.originHost ?? '', filter.domainsInclude, filter.domainsExclude) &&
      matchPattern(filter.pattern, documentUrl)
  );
}

/**
 * Collect every applicable exception and blocking filter, then decide:
 * blocked only when something blocks and nothing excepts.
 */
export function matchNetworkRequest(snapshot: FilterSnapshot, req: RequestInfo): RequestMatchResult {
  const genericBlockDisabled = isGenericBlockDisabled(snapshot, req);
  let filter: string | undefined;
  let exception: string | undefined;

  for (const candidate of applicableFilters(snapshot, req)) {
    if (isPlainException(candidate)) {
      exception ??= candidate.text;
    } else if (isBlockingFilter(candidate)) {
      if (genericBlockDisabled && candidate.domainsInclude.length === 0) {
        continue;
      }
      filter ??= candidate.text;
    }

    if (filter !== undefined && exception !== undefined) {
      break;
    }
  }

  return {
    blocked: filter !== undefined && exception === undefined,
    filter,
    exception,
  };
}

/**
 * First $redirect resource that applies, honouring exceptions. A
 * $redirect-rule resource is only used when the request is blocked by
 * another filter.
 */
export function findRedirectResource(snapshot: FilterSnapshot, req: RequestInfo): string | undefined {
  const redirects: NetworkFilter[] = [];
  const cancelled = new Set<string>();
  let cancelAll = false;

  for (const filter of applicableFilters(snapshot, req)) {
    const isRedirect = hasOption(filter.options, FilterOption.Redirect | FilterOption.RedirectRule);

    if (filter.isException) {
      if (isPlainException(filter)) {
        return undefined;
      }
      if (isRedirect) {
        if (filter.redirectResource === undefined) {
          cancelAll = true;
        } else {
          cancelled.add(filter.redirectResource);
        }
      }
    } else if (isRedirect && filter.redirectResource !== undefined) {
      redirects.push(filter);
    }
  }

  if (cancelAll) {
    return undefined;
  }

  const available = redirects.filter(
    (f) => f.redirectResource !== undefined && !cancelled.has(f.redirectResource)
  );

  const direct = available.find((f) => hasOption(f.options, FilterOption.Redirect));
  if (direct) {
    return direct.redirectResource;
  }

  const rule = available.find((f) => hasOption(f.options, FilterOption.RedirectRule));
  if (rule && matchNetworkRequest(snapshot, req).blocked) {
    return rule.redirectResource;
  }

  return undefined;
}

/**
 * Union of $removeparam parameters, in first-seen order. An exception
 * naming parameters cancels those; a bare "@@...$removeparam" cancels all.
 */
export function collectRemoveParams(snapshot: FilterSnapshot, req: RequestInfo): string[] {
  const params: string[] = [];
  const cancelled = new Set<string>();

  for (const filter of applicableFilters(snapshot, req)) {
    if (!hasOption(filter.options, FilterOption.RemoveParam)) {
      continue;
    }

    if (filter.isException) {
      if (filter.removeParams.length === 0) {
        return [];
      }
      for (const param of filter.removeParams) {
        cancelled.add(param);
      }
      continue;
    }

    for (const param of filter.removeParams) {
      if (!params.includes(param)) {
        params.push(param);
      }
    }
  }

  return params.filter((p) => !cancelled.has(p));
}

/**
 * Delete the given query parameters from a URL. Unparseable URLs are
 * returned unchanged.
 */
export function stripQueryParams(url: string, params: readonly string[]): string {
  if (params.length === 0) {
    return url;
  }

  try {
    const parsed = new URL(url);
    for (const param of params) {
      parsed.searchParams.delete(param);
    }
    return parsed.href;
  } catch {
    return url;
  }
}
