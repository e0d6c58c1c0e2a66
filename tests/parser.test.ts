import { describe, it, expect } from 'vitest';
import {
  parseCosmeticFilter,
  parseFilterLine,
  parseFilterList,
  parseNetworkFilter,
  parseScriptletFilter,
} from '../src/filters/parser.js';
import { FilterSyntaxError } from '../src/filters/types.js';
import { FilterOption, hasOption, requestTypeFromString } from '../src/models/filter.js';

describe('parseNetworkFilter', () => {
  it('should parse a hostname-anchored blocking filter with options', () => {
    const filter = parseNetworkFilter('||ads.example.com^$script,third-party');

    expect(filter.text).toBe('||ads.example.com^$script,third-party');
    expect(filter.isException).toBe(false);
    expect(filter.anchorDomain).toBe('ads.example.com');
    expect(hasOption(filter.options, FilterOption.Script)).toBe(true);
    expect(hasOption(filter.options, FilterOption.ThirdParty)).toBe(true);
    expect(hasOption(filter.options, FilterOption.Image)).toBe(false);
  });

  it('should parse exception filters', () => {
    const filter = parseNetworkFilter('@@||example.com/safe^');

    expect(filter.isException).toBe(true);
    expect(filter.anchorDomain).toBe('example.com');
    expect(filter.options).toBe(0);
  });

  it('should leave filters without a hostname anchor unindexed', () => {
    expect(parseNetworkFilter('/banner/ads/').anchorDomain).toBeUndefined();
    expect(parseNetworkFilter('|https://ads.').anchorDomain).toBeUndefined();
  });

  it('should split domain= into include and exclude lists', () => {
    const filter = parseNetworkFilter('/ads/$domain=A.test|~b.a.test');

    expect(filter.domainsInclude).toEqual(['a.test']);
    expect(filter.domainsExclude).toEqual(['b.a.test']);
  });

  it('should apply negated types to every other type', () => {
    const filter = parseNetworkFilter('banner$~script');

    expect(hasOption(filter.options, FilterOption.Script)).toBe(false);
    expect(hasOption(filter.options, FilterOption.Image)).toBe(true);
    expect(hasOption(filter.options, FilterOption.Document)).toBe(true);
  });

  it('should include the other type in a negated-only type set', () => {
    const filter = parseNetworkFilter('banner$~image');

    expect(hasOption(filter.options, FilterOption.Other)).toBe(true);
    expect(hasOption(filter.options, FilterOption.Image)).toBe(false);
  });

  it('should leave the other type out of a positive type set', () => {
    expect(hasOption(parseNetworkFilter('banner$image').options, FilterOption.Other)).toBe(false);
    expect(hasOption(parseNetworkFilter('banner$other').options, FilterOption.Other)).toBe(true);
  });

  it('should subtract negated types from positive ones', () => {
    const filter = parseNetworkFilter('banner$image,script,~script');

    expect(hasOption(filter.options, FilterOption.Image)).toBe(true);
    expect(hasOption(filter.options, FilterOption.Script)).toBe(false);
  });

  it('should treat ~third-party as first-party', () => {
    const filter = parseNetworkFilter('||cdn.test^$~third-party');

    expect(hasOption(filter.options, FilterOption.FirstParty)).toBe(true);
    expect(hasOption(filter.options, FilterOption.ThirdParty)).toBe(false);
  });

  it('should parse option aliases', () => {
    const filter = parseNetworkFilter('||x.test^$xhr,3p,css');

    expect(hasOption(filter.options, FilterOption.XMLHttpRequest)).toBe(true);
    expect(hasOption(filter.options, FilterOption.ThirdParty)).toBe(true);
    expect(hasOption(filter.options, FilterOption.Stylesheet)).toBe(true);
  });

  it('should parse removeparam parameters', () => {
    const filter = parseNetworkFilter('||shop.test^$removeparam=utm_source|utm_medium');

    expect(hasOption(filter.options, FilterOption.RemoveParam)).toBe(true);
    expect(filter.removeParams).toEqual(['utm_source', 'utm_medium']);
  });

  it('should allow a bare removeparam only on exceptions', () => {
    expect(parseNetworkFilter('@@||shop.test^$removeparam').removeParams).toEqual([]);
    expect(() => parseNetworkFilter('||shop.test^$removeparam')).toThrow(FilterSyntaxError);
  });

  it('should parse redirect resources', () => {
    const filter = parseNetworkFilter('||cdn.test/analytics.js$script,redirect=noop.js');

    expect(hasOption(filter.options, FilterOption.Redirect)).toBe(true);
    expect(filter.redirectResource).toBe('noop.js');
  });

  it('should require a redirect resource on blocking filters', () => {
    expect(() => parseNetworkFilter('||cdn.test/a.js$redirect')).toThrow(
      'Option "redirect" requires a resource name'
    );
    expect(parseNetworkFilter('@@||cdn.test/a.js$redirect').redirectResource).toBeUndefined();
  });

  it('should keep a "$" inside a regex pattern', () => {
    const filter = parseNetworkFilter('/ads$/$script');

    expect(filter.pattern).toEqual({ kind: 'regex', source: 'ads$' });
    expect(hasOption(filter.options, FilterOption.Script)).toBe(true);
  });

  it('should give a filter and its $badfilter the same key', () => {
    const filter = parseNetworkFilter('||ads.test^$third-party,script');
    const badfilter = parseNetworkFilter('||ads.test^$script,third-party,badfilter');

    expect(filter.badfilterKey).toBe('||ads.test^$script,third-party');
    expect(badfilter.badfilterKey).toBe(filter.badfilterKey);
    expect(hasOption(badfilter.options, FilterOption.Badfilter)).toBe(true);
  });

  it.each([
    ['/x$bogus', 'Unknown option "bogus"'],
    ['/x$', 'Empty option list'],
    ['/x$script,', 'Empty option'],
    ['||', 'Pattern has only anchors'],
    ['|', 'Pattern has only anchors'],
    ['/x$domain=', 'Option "domain" requires a value'],
    ['/x$~domain=a.test', 'Option "~domain" cannot be negated'],
  ])('should reject %s', (line, message) => {
    expect(() => parseNetworkFilter(line)).toThrow(message);
  });
});

describe('parseCosmeticFilter', () => {
  it('should parse domain-specific hiding rules', () => {
    const filter = parseCosmeticFilter('Example.com,~news.example.com##.ad');

    expect(filter.selector).toBe('.ad');
    expect(filter.domainsInclude).toEqual(['example.com']);
    expect(filter.domainsExclude).toEqual(['news.example.com']);
    expect(filter.isGeneric).toBe(false);
    expect(filter.isException).toBe(false);
  });

  it('should mark rules without included domains as generic', () => {
    expect(parseCosmeticFilter('##.banner').isGeneric).toBe(true);
    expect(parseCosmeticFilter('~news.example.com##.banner').isGeneric).toBe(true);
  });

  it('should parse exceptions and procedural rules', () => {
    expect(parseCosmeticFilter('example.com#@#.ad').isException).toBe(true);

    const procedural = parseCosmeticFilter('example.com#?#div:has(> .ad)');
    expect(procedural.isProcedural).toBe(true);
    expect(procedural.selector).toBe('div:has(> .ad)');
  });

  it('should reject an empty selector', () => {
    expect(() => parseCosmeticFilter('example.com##')).toThrow('Empty cosmetic selector');
  });
});

describe('parseScriptletFilter', () => {
  it('should keep the scriptlet call as the body', () => {
    const filter = parseScriptletFilter('example.com##+js(set-constant, adsEnabled, false)');

    expect(filter.body).toBe('+js(set-constant, adsEnabled, false)');
    expect(filter.domainsInclude).toEqual(['example.com']);
    expect(filter.isException).toBe(false);
  });

  it('should parse scriptlet exceptions', () => {
    expect(parseScriptletFilter('example.com#@#+js(noop-timers)').isException).toBe(true);
  });

  it('should reject unterminated or empty calls', () => {
    expect(() => parseScriptletFilter('##+js(noop-timers')).toThrow(FilterSyntaxError);
    expect(() => parseScriptletFilter('##+js()')).toThrow(FilterSyntaxError);
  });
});

describe('parseFilterLine', () => {
  it('should classify lines by their separator', () => {
    expect(parseFilterLine('##+js(noop-timers)').type).toBe('scriptlet');
    expect(parseFilterLine('example.com##.ad').type).toBe('cosmetic');
    expect(parseFilterLine('||ads.test^').type).toBe('network');
  });
});

describe('parseFilterList', () => {
  it('should sort rules by kind and record malformed lines', () => {
    const text = [
      '[Adblock Plus 2.0]',
      '! Title: Test list',
      '||ok.test^',
      '/x$bogus',
      '',
      '  example.com##.ad  ',
      '##+js(noop-timers)',
    ].join('\n');

    const result = parseFilterList(text);

    expect(result.network.map((f) => f.text)).toEqual(['||ok.test^']);
    expect(result.cosmetic.map((f) => f.text)).toEqual(['example.com##.ad']);
    expect(result.scriptlets.map((f) => f.body)).toEqual(['+js(noop-timers)']);
    expect(result.errors).toEqual([{ line: 4, text: '/x$bogus', error: 'Unknown option "bogus"' }]);
  });

  it('should handle CRLF line endings', () => {
    const result = parseFilterList('||a.test^\r\n||b.test^\r\n');

    expect(result.network.map((f) => f.text)).toEqual(['||a.test^', '||b.test^']);
    expect(result.errors).toEqual([]);
  });

  it('should return empty results for an empty list', () => {
    expect(parseFilterList('')).toEqual({ network: [], cosmetic: [], scriptlets: [], errors: [] });
  });
});

describe('requestTypeFromString', () => {
  it('should map aliases and unknown values', () => {
    expect(requestTypeFromString('script')).toBe('script');
    expect(requestTypeFromString('XHR')).toBe('xmlhttprequest');
    expect(requestTypeFromString('sub_frame')).toBe('subdocument');
    expect(requestTypeFromString('main_frame')).toBe('document');
    expect(requestTypeFromString('beacon')).toBe('other');
  });
});
