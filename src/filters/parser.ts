import {
  FilterOption,
  TYPE_OPTION_MASK,
  hasOption,
  type CosmeticFilter,
  type NetworkFilter,
  type ScriptletFilter,
} from '../models/filter.js';
import { compilePattern } from './pattern.js';
import { FilterSyntaxError, type FilterLineError, type ParsedFilterList } from './types.js';

const COSMETIC_SEPARATOR_REGEX = /#@#|#\?#|##/;
const SCRIPTLET_SEPARATOR_REGEX = /(#@?#)\+js\(/;
// "[Adblock Plus 2.0]" style list headers
const LIST_HEADER_REGEX = /^\[.*\]$/;

const TYPE_OPTIONS = new Map<string, number>([
  ['script', FilterOption.Script],
  ['image', FilterOption.Image],
  ['stylesheet', FilterOption.Stylesheet],
  ['css', FilterOption.Stylesheet],
  ['object', FilterOption.Object],
  ['xmlhttprequest', FilterOption.XMLHttpRequest],
  ['xhr', FilterOption.XMLHttpRequest],
  ['subdocument', FilterOption.SubDocument],
  ['frame', FilterOption.SubDocument],
  ['document', FilterOption.Document],
  ['doc', FilterOption.Document],
  ['font', FilterOption.Font],
  ['media', FilterOption.Media],
  ['websocket', FilterOption.WebSocket],
  ['ping', FilterOption.Ping],
  ['csp', FilterOption.CSP],
  ['other', FilterOption.Other],
]);

const MODIFIER_OPTIONS = new Map<string, number>([
  ['third-party', FilterOption.ThirdParty],
  ['3p', FilterOption.ThirdParty],
  ['first-party', FilterOption.FirstParty],
  ['1p', FilterOption.FirstParty],
  ['match-case', FilterOption.MatchCase],
  ['important', FilterOption.Important],
  ['popup', FilterOption.Popup],
  ['generichide', FilterOption.GenericHide],
  ['ghide', FilterOption.GenericHide],
  ['genericblock', FilterOption.GenericBlock],
  ['inline-script', FilterOption.InlineScript],
  ['inline-font', FilterOption.InlineFont],
  ['badfilter', FilterOption.Badfilter],
]);

// "~third-party" means first-party and vice versa
const NEGATED_PARTY_OPTIONS = new Map<string, number>([
  ['third-party', FilterOption.FirstParty],
  ['3p', FilterOption.FirstParty],
  ['first-party', FilterOption.ThirdParty],
  ['1p', FilterOption.ThirdParty],
]);

interface ParsedOptions {
  options: number;
  domainsInclude: string[];
  domainsExclude: string[];
  redirectResource?: string;
  removeParams: string[];
  csp?: string;
  // Option tokens without $badfilter, used for the badfilter key
  tokens: string[];
}

interface DomainLists {
  include: string[];
  exclude: string[];
}

function parseDomainList(value: string, separator: string): DomainLists {
  const lists: DomainLists = { include: [], exclude: [] };

  for (const rawEntry of value.split(separator)) {
    const entry = rawEntry.trim().toLowerCase();
    if (!entry) continue;

    if (entry.startsWith('~')) {
      const domain = entry.slice(1);
      if (!domain) {
        throw new FilterSyntaxError('Empty negated domain');
      }
      lists.exclude.push(domain);
    } else {
      lists.include.push(entry);
    }
  }

  return lists;
}

function requireValue(key: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    throw new FilterSyntaxError(`Option "${key}" requires a value`);
  }
  return value.trim();
}

/**
 * Parse the comma-separated option list that follows "$".
 */
export function parseFilterOptions(optionsText: string): ParsedOptions {
  const parsed: ParsedOptions = {
    options: 0,
    domainsInclude: [],
    domainsExclude: [],
    removeParams: [],
    tokens: [],
  };
  let negatedTypes = 0;

  for (const rawOption of optionsText.split(',')) {
    const option = rawOption.trim();
    if (!option) {
      throw new FilterSyntaxError('Empty option');
    }

    const eqIndex = option.indexOf('=');
    const key = (eqIndex === -1 ? option : option.slice(0, eqIndex)).toLowerCase();
    const value = eqIndex === -1 ? undefined : option.slice(eqIndex + 1);

    if (key !== 'badfilter') {
      parsed.tokens.push(value === undefined ? key : `${key}=${value}`);
    }

    if (key.startsWith('~')) {
      const negated = key.slice(1);
      const typeBit = TYPE_OPTIONS.get(negated);
      const partyBit = NEGATED_PARTY_OPTIONS.get(negated);
      if (typeBit !== undefined && value === undefined) {
        negatedTypes |= typeBit;
      } else if (partyBit !== undefined && value === undefined) {
        parsed.options |= partyBit;
      } else {
        throw new FilterSyntaxError(`Option "${key}" cannot be negated`);
      }
      continue;
    }

    const flag = value === undefined ? (TYPE_OPTIONS.get(key) ?? MODIFIER_OPTIONS.get(key)) : undefined;
    if (flag !== undefined) {
      parsed.options |= flag;
      continue;
    }

    switch (key) {
      case 'domain':
      case 'from': {
        const domains = parseDomainList(requireValue(key, value), '|');
        if (domains.include.length === 0 && domains.exclude.length === 0) {
          throw new FilterSyntaxError(`Option "${key}" has no domains`);
        }
        parsed.domainsInclude.push(...domains.include);
        parsed.domainsExclude.push(...domains.exclude);
        break;
      }

      // A bare $redirect is only valid on exceptions, checked by the caller
      case 'redirect':
      case 'redirect-rule':
        parsed.options |= key === 'redirect' ? FilterOption.Redirect : FilterOption.RedirectRule;
        if (value !== undefined) {
          parsed.redirectResource = requireValue(key, value);
        }
        break;

      case 'removeparam':
        parsed.options |= FilterOption.RemoveParam;
        if (value !== undefined) {
          const params = value
            .split('|')
            .map((p) => p.trim())
            .filter((p) => p.length > 0);
          if (params.length === 0) {
            throw new FilterSyntaxError('Option "removeparam" has no parameters');
          }
          parsed.removeParams.push(...params);
        }
        break;

      case 'csp':
        parsed.options |= FilterOption.CSP;
        parsed.csp = requireValue(key, value);
        break;

      case 'header':
        parsed.options |= FilterOption.Header;
        requireValue(key, value);
        break;

      default:
        throw new FilterSyntaxError(`Unknown option "${key}"`);
    }
  }

  if (negatedTypes !== 0) {
    const positive = parsed.options & TYPE_OPTION_MASK;
    const types = (positive === 0 ? TYPE_OPTION_MASK : positive) & ~negatedTypes;
    if (types === 0) {
      throw new FilterSyntaxError('Option list excludes every request type');
    }
    parsed.options = (parsed.options & ~TYPE_OPTION_MASK) | types;
  }

  return parsed;
}

/**
 * Index of the "$" that starts the option list, or -1.
 * Regex patterns ("/.../$opts") are skipped over so a "$" inside the
 * expression is not taken as the separator.
 */
function findOptionsSeparator(rule: string): number {
  if (rule.startsWith('/')) {
    const close = rule.lastIndexOf('/$');
    if (close > 0) {
      return close + 1;
    }
    if (rule.length > 2 && rule.endsWith('/')) {
      return -1;
    }
  }

  for (let i = 0; i < rule.length; i++) {
    if (rule[i] === '\\') {
      i++;
      continue;
    }
    if (rule[i] === '$') {
      return i;
    }
  }
  return -1;
}

export function parseNetworkFilter(line: string): NetworkFilter {
  let rule = line;
  const isException = rule.startsWith('@@');
  if (isException) {
    rule = rule.slice(2);
  }

  const separator = findOptionsSeparator(rule);
  const rawPattern = (separator === -1 ? rule : rule.slice(0, separator)).replace(/\\\$/g, '$');
  const optionsText = separator === -1 ? undefined : rule.slice(separator + 1);

  if (optionsText !== undefined && optionsText.trim() === '') {
    throw new FilterSyntaxError('Empty option list');
  }
  if (rawPattern === '' && optionsText === undefined) {
    throw new FilterSyntaxError('Empty pattern');
  }
  if (/^\|+$/.test(rawPattern)) {
    throw new FilterSyntaxError('Pattern has only anchors');
  }

  const parsedOptions = optionsText === undefined ? undefined : parseFilterOptions(optionsText);
  const options = parsedOptions?.options ?? 0;

  if (
    !isException &&
    hasOption(options, FilterOption.RemoveParam) &&
    (parsedOptions?.removeParams.length ?? 0) === 0
  ) {
    throw new FilterSyntaxError('Option "removeparam" requires parameters');
  }
  if (
    !isException &&
    hasOption(options, FilterOption.Redirect | FilterOption.RedirectRule) &&
    parsedOptions?.redirectResource === undefined
  ) {
    throw new FilterSyntaxError('Option "redirect" requires a resource name');
  }

  const pattern = compilePattern(rawPattern, hasOption(options, FilterOption.MatchCase));
  const anchorDomain =
    pattern.kind === 'anchored' && pattern.anchor === 'hostname' ? pattern.hostname : undefined;

  const tokens = parsedOptions ? [...parsedOptions.tokens].sort() : [];
  const badfilterKey = `${isException ? '@@' : ''}${rawPattern}${tokens.length > 0 ? `$${tokens.join(',')}` : ''}`;

  return {
    text: line,
    pattern,
    options,
    isException,
    domainsInclude: parsedOptions?.domainsInclude ?? [],
    domainsExclude: parsedOptions?.domainsExclude ?? [],
    redirectResource: parsedOptions?.redirectResource,
    removeParams: parsedOptions?.removeParams ?? [],
    csp: parsedOptions?.csp,
    anchorDomain,
    badfilterKey,
  };
}

export function parseCosmeticFilter(line: string): CosmeticFilter {
  const match = COSMETIC_SEPARATOR_REGEX.exec(line);
  if (!match) {
    throw new FilterSyntaxError('Missing cosmetic separator');
  }

  const separator = match[0];
  const selector = line.slice(match.index + separator.length).trim();
  if (!selector) {
    throw new FilterSyntaxError('Empty cosmetic selector');
  }

  const domains = parseDomainList(line.slice(0, match.index), ',');

  return {
    text: line,
    selector,
    domainsInclude: domains.include,
    domainsExclude: domains.exclude,
    isGeneric: domains.include.length === 0,
    isException: separator === '#@#',
    isProcedural: separator === '#?#',
  };
}

export function parseScriptletFilter(line: string): ScriptletFilter {
  const match = SCRIPTLET_SEPARATOR_REGEX.exec(line);
  if (!match) {
    throw new FilterSyntaxError('Missing scriptlet separator');
  }

  const body = line.slice(match.index + match[1].length).trim();
  if (!body.endsWith(')') || body === '+js()') {
    throw new FilterSyntaxError('Malformed scriptlet call');
  }

  const domains = parseDomainList(line.slice(0, match.index), ',');

  return {
    text: line,
    body,
    domainsInclude: domains.include,
    domainsExclude: domains.exclude,
    isException: match[1] === '#@#',
  };
}

export type ParsedFilterLine =
  | { type: 'network'; filter: NetworkFilter }
  | { type: 'cosmetic'; filter: CosmeticFilter }
  | { type: 'scriptlet'; filter: ScriptletFilter };

/**
 * Classify and parse one trimmed, non-comment line.
 * Throws FilterSyntaxError when the rule is malformed.
 */
export function parseFilterLine(line: string): ParsedFilterLine {
  if (SCRIPTLET_SEPARATOR_REGEX.test(line)) {
    return { type: 'scriptlet', filter: parseScriptletFilter(line) };
  }
  if (COSMETIC_SEPARATOR_REGEX.test(line)) {
    return { type: 'cosmetic', filter: parseCosmeticFilter(line) };
  }
  return { type: 'network', filter: parseNetworkFilter(line) };
}

function isSkippedLine(line: string): boolean {
  return line === '' || line.startsWith('!') || LIST_HEADER_REGEX.test(line);
}

/**
 * Parse newline-delimited filter-list text. Malformed rules are collected in
 * `errors` and skipped; anything other than a FilterSyntaxError propagates.
 */
export function parseFilterList(text: string): ParsedFilterList {
  const result: ParsedFilterList = { network: [], cosmetic: [], scriptlets: [], errors: [] };
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (isSkippedLine(line)) continue;

    try {
      const parsed = parseFilterLine(line);
      switch (parsed.type) {
        case 'network':
          result.network.push(parsed.filter);
          break;
        case 'cosmetic':
          result.cosmetic.push(parsed.filter);
          break;
        case 'scriptlet':
          result.scriptlets.push(parsed.filter);
          break;
      }
    } catch (error) {
      if (!(error instanceof FilterSyntaxError)) {
        throw error;
      }
      const lineError: FilterLineError = { line: i + 1, text: line, error: error.message };
      result.errors.push(lineError);
    }
  }

  return result;
}
