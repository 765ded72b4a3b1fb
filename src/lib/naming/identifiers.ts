/**
 * Identifier canonicalization and collision helpers
 *
 * Pure functions; the stateful bookkeeping lives in {@link NameRegistry}.
 */

import type { NamingStyle } from '../../types/config.js';

export interface CanonicalizeOptions {
  style: NamingStyle;
  reservedWords: ReadonlySet<string>;
  /** Used when nothing of the raw name survives, e.g. `""` or `"$$"` */
  fallback?: string;
}

export type NamingStyleSuffix =
  | 'SnakeCase'
  | 'KebabCase'
  | 'DotNotation'
  | 'CamelCase'
  | 'PascalCase'
  | 'Lowercase'
  | 'Uppercase';

const SPLIT_WORDS = /[-_.\s]+|(?<=[a-z])(?=[A-Z])/;
const INVALID_IDENTIFIER_CHARS = /[^a-zA-Z0-9_]/g;
const LEADING_MINUS = /(?:^|(?<=\s))-(?=\d)/g;
const ALL_UPPERCASE = /^\p{Lu}+$/u;
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;
const NON_LETTER_OR_DIGIT = /[^\p{L}\p{N}]/gu;

const SYMBOL_WORDS: Readonly<Record<string, string>> = {
  _: 'Underscore',
  '-': 'Dash',
  '.': 'Dot',
  '@': 'At',
  '#': 'Hash',
  $: 'Dollar',
  '%': 'Percent',
  '&': 'And',
  '+': 'Plus',
  '~': 'Tilde',
  '!': 'Bang',
  '*': 'Star',
  '/': 'Slash',
  '\\': 'Backslash',
  ':': 'Colon',
  '^': 'Caret',
  '|': 'Pipe',
};

// Canonical forms are fixed points; a couple of passes settle inputs like "aB" → "AB" → "Ab"
const MAX_CANONICAL_PASSES = 4;

export function isLetterOrDigit(ch: string): boolean {
  return LETTER_OR_DIGIT.test(ch);
}

/**
 * Split on separators and camelCase boundaries, capitalising every word.
 * All-uppercase words (`USER` in `USER_STATUS`) are lowered after their first
 * letter; mixed-case words keep their tail so `myAPIResponse` → `MyAPIResponse`.
 */
export function toPascalCase(input: string): string {
  if (input.length === 0) {
    return input;
  }

  const prepared = input.replace(/\+/g, 'Plus').replace(LEADING_MINUS, 'Minus');
  const parts = prepared.split(SPLIT_WORDS).filter((part) => part.length > 0);

  if (parts.length === 0) {
    return prepared;
  }

  return parts
    .map((part) => {
      const tail = ALL_UPPERCASE.test(part) ? part.slice(1).toLowerCase() : part.slice(1);
      return part.charAt(0).toUpperCase() + tail;
    })
    .join('');
}

function canonicalizeOnce(raw: string, options: CanonicalizeOptions): string {
  const fallback = options.fallback ?? 'UnknownType';

  let result = raw.trim().length === 0 ? '' : toPascalCase(raw).replace(INVALID_IDENTIFIER_CHARS, '');
  if (result.length === 0) {
    result = fallback;
  }

  if (options.style === 'camel' && /^[A-Za-z]/.test(result)) {
    result = result.charAt(0).toLowerCase() + result.slice(1);
  }

  if (/^\d/.test(result)) {
    result = `_${result}`;
  }

  return options.reservedWords.has(result) ? `@${result}` : result;
}

/**
 * Convert a raw schema, property or enum-literal name into a target identifier.
 * Idempotent: canonicalizing a canonical identifier returns it unchanged.
 */
export function canonicalize(raw: string, options: CanonicalizeOptions): string {
  let current = canonicalizeOnce(raw, options);
  for (let pass = 1; pass < MAX_CANONICAL_PASSES; pass++) {
    const next = canonicalizeOnce(current, options);
    if (next === current) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * How close a raw name already is to its canonical form; lower is more natural.
 */
export function naturalnessScore(raw: string, canonicalName: string): number {
  if (raw === canonicalName) {
    return 0;
  }

  if (raw.toLowerCase() === canonicalName.toLowerCase()) {
    return 1;
  }

  const specialCount = raw.match(NON_LETTER_OR_DIGIT)?.length ?? 0;
  if (specialCount > 0) {
    return 10 + specialCount;
  }

  return 2;
}

/**
 * Replace the leading run of symbols with words (`_id` → `Underscore id`).
 * Returns undefined when there is no known symbol to expand.
 */
export function expandLeadingSymbols(name: string): string | undefined {
  let expanded = '';
  let index = 0;
  let anyExpanded = false;

  while (index < name.length && !isLetterOrDigit(name.charAt(index))) {
    const word = SYMBOL_WORDS[name.charAt(index)];
    if (word !== undefined) {
      expanded += `${word} `;
      anyExpanded = true;
    } else {
      expanded += ' ';
    }
    index++;
  }

  return anyExpanded ? expanded + name.slice(index) : undefined;
}

/**
 * Replace every symbol with a word surrounded by spaces; unknown symbols become a
 * plain word boundary.
 */
export function expandAllSymbols(name: string): string {
  let expanded = '';
  for (const ch of name) {
    if (isLetterOrDigit(ch)) {
      expanded += ch;
    } else {
      const word = SYMBOL_WORDS[ch];
      expanded += word !== undefined ? ` ${word} ` : ' ';
    }
  }
  return expanded;
}

export function detectNamingStyle(name: string): NamingStyleSuffix | undefined {
  if (name.length === 0) {
    return undefined;
  }
  if (name.includes('_')) {
    return 'SnakeCase';
  }
  if (name.includes('-')) {
    return 'KebabCase';
  }
  if (name.includes('.')) {
    return 'DotNotation';
  }

  const first = name.charAt(0);
  const hasUpper = /\p{Lu}/u.test(name);
  const hasLower = /\p{Ll}/u.test(name);

  if (/\p{Ll}/u.test(first) && hasUpper) {
    return 'CamelCase';
  }
  if (/\p{Lu}/u.test(first) && hasLower) {
    return 'PascalCase';
  }
  if (!hasUpper) {
    return 'Lowercase';
  }
  if (!hasLower) {
    return 'Uppercase';
  }
  return undefined;
}

/**
 * Find a name for `raw` that differs from `canonicalName` and is not taken.
 *
 * Candidates, in order: leading-symbol expansion, full symbol expansion,
 * naming-style suffix, then the smallest integer suffix from 2. Returns
 * undefined only when `maxNumericSuffix` is reached.
 */
export function differentiate(
  raw: string,
  canonicalName: string,
  isTaken: (name: string) => boolean,
  toCanonical: (raw: string) => string,
  maxNumericSuffix = 10_000,
): string | undefined {
  const accept = (candidate: string): boolean =>
    candidate.length > 0 && candidate !== canonicalName && !isTaken(candidate);

  const leading = expandLeadingSymbols(raw);
  if (leading !== undefined) {
    const candidate = toCanonical(leading);
    if (accept(candidate)) {
      return candidate;
    }
  }

  const expanded = expandAllSymbols(raw);
  if (expanded !== raw) {
    const candidate = toCanonical(expanded);
    if (accept(candidate)) {
      return candidate;
    }
  }

  // an escaped keyword cannot take a suffix after its '@'
  const base = canonicalName.startsWith('@') ? canonicalName.slice(1) : canonicalName;

  const style = detectNamingStyle(raw);
  if (style !== undefined && accept(base + style)) {
    return base + style;
  }

  for (let suffix = 2; suffix <= maxNumericSuffix; suffix++) {
    if (accept(`${base}${suffix}`)) {
      return `${base}${suffix}`;
    }
  }

  return undefined;
}
