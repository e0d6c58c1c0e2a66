export interface RequestUrl {
  href: string;
  hostname: string;
}

/**
 * Parse an absolute request URL. Returns null for anything the WHATWG parser
 * rejects, so callers can fail open.
 */
export function parseRequestUrl(raw: string): RequestUrl | null {
  try {
    const url = new URL(raw);
    return { href: url.href, hostname: normalizeHostname(url.hostname) };
  } catch {
    return null;
  }
}

export function normalizeHostname(host: string): string {
  let hostname = host.trim().toLowerCase();
  if (hostname.endsWith('.')) {
    hostname = hostname.slice(0, -1);
  }
  if (hostname.startsWith('[') && hostname.endsWith(']')) {
    hostname = hostname.slice(1, -1);
  }
  return hostname;
}

/**
 * True when `host` is `domain` or one of its subdomains.
 * Comparison is label-aware: "badexample.com" is not under "example.com".
 */
export function isSameOrSubdomain(host: string, domain: string): boolean {
  if (!host || !domain) return false;
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * A request is third-party when neither host is a suffix of the other.
 */
export function isThirdPartyRequest(requestHost: string, originHost: string): boolean {
  return !isSameOrSubdomain(requestHost, originHost) && !isSameOrSubdomain(originHost, requestHost);
}

/**
 * Apply include/exclude domain lists to a host. Exclusion wins; an empty
 * include list means "every domain".
 */
export function matchesDomainLists(
  host: string,
  include: readonly string[],
  exclude: readonly string[]
): boolean {
  for (const domain of exclude) {
    if (isSameOrSubdomain(host, domain)) {
      return false;
    }
  }

  if (include.length === 0) {
    return true;
  }

  return include.some((domain) => isSameOrSubdomain(host, domain));
}
