/**
 * Filter record types
 * Based on the Adblock Plus / uBlock Origin filter-list syntax
 */

export const REQUEST_TYPES = [
  'document',
  'subdocument',
  'stylesheet',
  'script',
  'image',
  'font',
  'object',
  'xmlhttprequest',
  'ping',
  'csp',
  'media',
  'websocket',
  'other',
] as const;

export type RequestType = (typeof REQUEST_TYPES)[number];

export const FilterOption = {
  None: 0,
  Script: 1 << 0,
  Image: 1 << 1,
  Stylesheet: 1 << 2,
  Object: 1 << 3,
  XMLHttpRequest: 1 << 4,
  SubDocument: 1 << 5,
  Document: 1 << 6,
  Font: 1 << 7,
  Media: 1 << 8,
  WebSocket: 1 << 9,
  Ping: 1 << 10,
  CSP: 1 << 11,
  ThirdParty: 1 << 12,
  MatchCase: 1 << 13,
  Important: 1 << 14,
  Popup: 1 << 15,
  GenericHide: 1 << 16,
  GenericBlock: 1 << 17,
  InlineScript: 1 << 18,
  InlineFont: 1 << 19,
  Badfilter: 1 << 20,
  Redirect: 1 << 21,
  RedirectRule: 1 << 22,
  RemoveParam: 1 << 23,
  Header: 1 << 24,
  FirstParty: 1 << 25,
  Other: 1 << 26,
} as const;

export const TYPE_OPTION_MASK =
  FilterOption.Script |
  FilterOption.Image |
  FilterOption.Stylesheet |
  FilterOption.Object |
  FilterOption.XMLHttpRequest |
  FilterOption.SubDocument |
  FilterOption.Document |
  FilterOption.Font |
  FilterOption.Media |
  FilterOption.WebSocket |
  FilterOption.Ping |
  FilterOption.CSP |
  FilterOption.Other;

const REQUEST_TYPE_BITS: Record<RequestType, number> = {
  document: FilterOption.Document,
  subdocument: FilterOption.SubDocument,
  stylesheet: FilterOption.Stylesheet,
  script: FilterOption.Script,
  image: FilterOption.Image,
  font: FilterOption.Font,
  object: FilterOption.Object,
  xmlhttprequest: FilterOption.XMLHttpRequest,
  ping: FilterOption.Ping,
  csp: FilterOption.CSP,
  media: FilterOption.Media,
  websocket: FilterOption.WebSocket,
  other: FilterOption.Other,
};

export function requestTypeBit(type: RequestType): number {
  return REQUEST_TYPE_BITS[type];
}

export function isRequestType(value: string): value is RequestType {
  return Object.prototype.hasOwnProperty.call(REQUEST_TYPE_BITS, value);
}

/**
 * Map a request-type string (filter option spelling or webRequest spelling)
 * to a RequestType. Unknown values map to 'other'.
 */
export function requestTypeFromString(value: string): RequestType {
  const type = value.trim().toLowerCase();
  switch (type) {
    case 'xhr':
      return 'xmlhttprequest';
    case 'main_frame':
      return 'document';
    case 'sub_frame':
      return 'subdocument';
    default:
      return isRequestType(type) ? type : 'other';
  }
}

export function hasOption(options: number, flag: number): boolean {
  return (options & flag) !== 0;
}

/**
 * Compiled URL pattern. Text and segments are already lowercased unless the
 * filter carries $match-case. Segments are the pattern split on '*'; they may
 * contain the '^' separator placeholder.
 */
export type FilterPattern =
  | { kind: 'literal'; text: string }
  | { kind: 'wildcard'; text: string; segments: readonly string[] }
  | {
      kind: 'anchored';
      anchor: 'start' | 'end' | 'exact';
      text: string;
      segments: readonly string[];
    }
  | {
      kind: 'anchored';
      anchor: 'hostname';
      text: string;
      hostname: string;
      remainder: readonly string[];
      anchoredEnd: boolean;
    }
  // Regular-expression filters are recognised but never match
  | { kind: 'regex'; source: string };

export interface NetworkFilter {
  readonly text: string;
  readonly pattern: FilterPattern;
  readonly options: number;
  readonly isException: boolean;
  readonly domainsInclude: readonly string[];
  readonly domainsExclude: readonly string[];
  readonly redirectResource?: string;
  readonly removeParams: readonly string[];
  readonly csp?: string;
  // Hostname used to bucket the filter in the domain index
  readonly anchorDomain?: string;
  // Canonical text compared by $badfilter
  readonly badfilterKey: string;
}

export interface CosmeticFilter {
  readonly text: string;
  readonly selector: string;
  readonly domainsInclude: readonly string[];
  readonly domainsExclude: readonly string[];
  readonly isGeneric: boolean;
  readonly isException: boolean;
  readonly isProcedural: boolean;
}

export interface ScriptletFilter {
  readonly text: string;
  readonly body: string;
  readonly domainsInclude: readonly string[];
  readonly domainsExclude: readonly string[];
  readonly isException: boolean;
}
