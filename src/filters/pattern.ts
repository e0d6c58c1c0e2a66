import type { FilterPattern } from '../models/filter.js';

// Characters that end the hostname part of a "||host..." pattern
const HOSTNAME_END_REGEX = /[/^*|?:#&=]/;

/**
 * Compile the pattern part of a network filter.
 * "/.../" is a regex pattern, "||" a hostname anchor, a leading or trailing
 * "|" a start/end anchor. Anything else is a plain or wildcard pattern.
 */
export function compilePattern(raw: string, matchCase: boolean): FilterPattern {
  if (raw.length > 2 && raw.startsWith('/') && raw.endsWith('/')) {
    return { kind: 'regex', source: raw.slice(1, -1) };
  }

  const text = matchCase ? raw : raw.toLowerCase();

  if (text.startsWith('||')) {
    let body = text.slice(2);
    const anchoredEnd = body.endsWith('|');
    if (anchoredEnd) {
      body = body.slice(0, -1);
    }

    const match = HOSTNAME_END_REGEX.exec(body);
    const hostEnd = match ? match.index : body.length;

    // "||ads*.example.com" has no usable hostname: fall back to a wildcard scan
    if (hostEnd === 0 || body[hostEnd] === '*') {
      return { kind: 'wildcard', text: body, segments: body.split('*') };
    }

    return {
      kind: 'anchored',
      anchor: 'hostname',
      text,
      hostname: body.slice(0, hostEnd).toLowerCase(),
      remainder: body.slice(hostEnd).split('*'),
      anchoredEnd,
    };
  }

  const startAnchor = text.startsWith('|');
  let body = startAnchor ? text.slice(1) : text;
  const endAnchor = body.length > 0 && body.endsWith('|');
  if (endAnchor) {
    body = body.slice(0, -1);
  }

  if (startAnchor || endAnchor) {
    return {
      kind: 'anchored',
      anchor: startAnchor && endAnchor ? 'exact' : startAnchor ? 'start' : 'end',
      text: body,
      segments: body.split('*'),
    };
  }

  if (body.includes('*') || body.includes('^')) {
    return { kind: 'wildcard', text: body, segments: body.split('*') };
  }

  return { kind: 'literal', text: body };
}

/**
 * The '^' placeholder matches anything but a letter, a digit or one of
 * "_-.%", and also matches the end of the URL.
 */
function isSeparatorChar(char: string): boolean {
  return !/[a-zA-Z0-9_\-.%]/.test(char);
}

/**
 * Match a segment at exactly `pos`. Returns the end position, or -1.
 */
function matchSegmentAt(url: string, segment: string, pos: number): number {
  let i = pos;
  for (let j = 0; j < segment.length; j++) {
    const expected = segment[j];
    if (expected === '^') {
      if (i === url.length) {
        return j === segment.length - 1 ? i : -1;
      }
      if (!isSeparatorChar(url[i])) {
        return -1;
      }
    } else if (url[i] !== expected) {
      return -1;
    }
    i++;
  }
  return i;
}

function findSegment(url: string, segment: string, from: number): number {
  if (!segment.includes('^')) {
    const index = url.indexOf(segment, from);
    return index === -1 ? -1 : index + segment.length;
  }
  for (let pos = from; pos <= url.length; pos++) {
    const end = matchSegmentAt(url, segment, pos);
    if (end !== -1) {
      return end;
    }
  }
  return -1;
}

function endsWithSegment(url: string, segment: string, from: number): boolean {
  if (!segment.includes('^')) {
    return url.length - segment.length >= from && url.endsWith(segment);
  }
  for (let pos = from; pos <= url.length; pos++) {
    if (matchSegmentAt(url, segment, pos) === url.length) {
      return true;
    }
  }
  return false;
}

/**
 * Verify that every non-empty segment occurs in order, the first search
 * starting at `from` and each later one after the previous match.
 */
function matchSegments(
  url: string,
  segments: readonly string[],
  from: number,
  anchoredStart: boolean,
  anchoredEnd: boolean
): boolean {
  let pos = from;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const isLast = i === segments.length - 1;

    if (segment === '') {
      continue;
    }

    if (i === 0 && anchoredStart) {
      const end = matchSegmentAt(url, segment, pos);
      if (end === -1 || (isLast && anchoredEnd && end !== url.length)) {
        return false;
      }
      pos = end;
      continue;
    }

    if (isLast && anchoredEnd) {
      return endsWithSegment(url, segment, pos);
    }

    const end = findSegment(url, segment, pos);
    if (end === -1) {
      return false;
    }
    pos = end;
  }

  // "||host|" leaves a single empty segment: the URL must end where it starts
  if (anchoredEnd && segments.length === 1) {
    return pos === url.length;
  }
  return true;
}

function isHostStartBoundary(url: string, pos: number): boolean {
  if (pos === 0) return true;
  const prev = url[pos - 1];
  return prev === '/' || prev === '.';
}

function isHostEndBoundary(url: string, end: number): boolean {
  if (end === url.length) return true;
  const next = url[end];
  return next === '/' || next === ':' || next === '?' || next === '#';
}

/**
 * Match a compiled pattern against a serialized URL. The URL must already
 * be lowercased when the pattern is case-insensitive.
 */
export function matchPattern(pattern: FilterPattern, url: string): boolean {
  switch (pattern.kind) {
    case 'regex':
      return false;

    case 'literal':
      return url.includes(pattern.text);

    case 'wildcard':
      return matchSegments(url, pattern.segments, 0, false, false);

    case 'anchored':
      if (pattern.anchor === 'hostname') {
        let from = 0;
        for (;;) {
          const pos = url.indexOf(pattern.hostname, from);
          if (pos === -1) {
            return false;
          }
          const end = pos + pattern.hostname.length;
          if (
            isHostStartBoundary(url, pos) &&
            isHostEndBoundary(url, end) &&
            matchSegments(url, pattern.remainder, end, true, pattern.anchoredEnd)
          ) {
            return true;
          }
          from = pos + 1;
        }
      }
      return matchSegments(
        url,
        pattern.segments,
        0,
        pattern.anchor !== 'end',
        pattern.anchor !== 'start'
      );
  }
}
