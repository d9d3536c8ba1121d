// ---------------------------------------------------------------------------
// Curve names
// ---------------------------------------------------------------------------
// Names are plain values. Derived curves copy the base and suffixes of their
// source and append a descriptor, e.g. "Woofer A - mean, 5 curves".

import type { CurveName } from './types.js';

const SUFFIX_SEPARATOR = ' - ';

export function curveName(base: string, suffixes: readonly string[] = [], prefix?: string): CurveName {
  return prefix === undefined
    ? { base, suffixes: [...suffixes] }
    : { prefix, base, suffixes: [...suffixes] };
}

/** Base name followed by every suffix, without the positional prefix. */
export function baseAndSuffixes(name: CurveName): string {
  return [name.base, ...name.suffixes].join(SUFFIX_SEPARATOR);
}

export function fullName(name: CurveName): string {
  const label = baseAndSuffixes(name);
  return name.prefix === undefined || name.prefix === '' ? label : `${name.prefix}. ${label}`;
}

export function addSuffix(name: CurveName, suffix: string): CurveName {
  return { ...name, suffixes: [...name.suffixes, suffix] };
}

export function clearSuffixes(name: CurveName): CurveName {
  return { ...name, suffixes: [] };
}

export function withBase(name: CurveName, base: string): CurveName {
  return { ...name, base };
}

export function withPrefix(name: CurveName, prefix: string | undefined): CurveName {
  return curveName(name.base, name.suffixes, prefix);
}

/** Name for a curve computed from `source`: same base and suffixes plus `descriptor`, no prefix. */
export function derivedName(source: CurveName, descriptor: string): CurveName {
  return curveName(source.base, [...source.suffixes, descriptor]);
}

function trimSeparators(text: string): string {
  return text.replace(/^[\s-]+|[\s-]+$/g, '');
}

/**
 * Longest block common to both strings. Ties go to the block starting
 * earliest in `a`, then earliest in `b`.
 */
export function longestCommonSubstring(a: string, b: string): string {
  let bestLength = 0;
  let bestEnd = 0;
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1;
        if (current[j] > bestLength) {
          bestLength = current[j];
          bestEnd = i;
        }
      }
    }
    previous = current;
  }

  return a.slice(bestEnd - bestLength, bestEnd);
}

/**
 * The block that most often turns up as the longest common substring
 * between pairs of names. Used to label aggregates of a group of curves.
 */
export function representativeBaseName(names: readonly string[]): string {
  if (names.length === 0) return '';
  if (names.length === 1) return trimSeparators(names[0]);

  const counts = new Map<string, number>();
  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      const match = longestCommonSubstring(names[i], names[j]);
      counts.set(match, (counts.get(match) ?? 0) + 1);
    }
  }

  let best = '';
  let bestCount = 0;
  for (const [match, count] of counts) {
    if (count > bestCount) {
      best = match;
      bestCount = count;
    }
  }

  return trimSeparators(best);
}
