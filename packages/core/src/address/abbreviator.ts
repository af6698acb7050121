import dictionary from './abbreviations.json' with { type: 'json' };
import { MAX_LOCALITY_LENGTH, MAX_STREET_LENGTH } from '../constants.js';
import type { AbbreviatedAddress, NormalizedAddress } from '../types/address.js';

type Rule = readonly [pattern: RegExp, replacement: string];

/** Cut at a word boundary only if it costs at most this many characters */
const WORD_BOUNDARY_SLACK = 5;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wholeWord(word: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(word)}(?![\\p{L}\\p{N}])`, 'giu');
}

/**
 * Longest key first so multi-word entries ("Strada Statale") win over their
 * prefixes ("Strada"); equal lengths in alphabetical order.
 */
function compileRules(entries: Record<string, string>): Rule[] {
  return Object.entries(entries)
    .sort(([a], [b]) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .map(([word, replacement]) => [wholeWord(word), replacement] as const);
}

const SUBSTITUTIONS = compileRules(dictionary.substitutions);
const ORDINALS = compileRules(dictionary.ordinals);
const ARTICLES = new RegExp(`\\s(?:${dictionary.articles.join('|')})(?=\\s)`, 'giu');

function applyRule(text: string, [pattern, replacement]: Rule): string {
  pattern.lastIndex = 0;
  return text.replace(pattern, () => replacement);
}

/**
 * Ordinal words to numerals, articulated prepositions dropped, whitespace collapsed
 */
function contractFurther(text: string): string {
  let result = ORDINALS.reduce(applyRule, text);
  result = result.replace(ARTICLES, '');
  return result.replace(/\s+/g, ' ').trim();
}

/**
 * Truncate to maxLength, preferring the last whitespace at or before the
 * limit when it lies within the final characters of the budget.
 * Trailing whitespace is trimmed.
 */
export function fitToLength(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;

  for (let i = maxLength; i > 0 && i >= maxLength - WORD_BOUNDARY_SLACK; i--) {
    if (/\s/.test(text.charAt(i))) {
      return text.slice(0, i).trimEnd();
    }
  }
  return text.slice(0, maxLength).trimEnd();
}

/**
 * Shorten text to at most maxLength characters.
 *
 * Dictionary substitutions are applied one at a time until the text fits,
 * then ordinals and prepositions are contracted, then the text is truncated.
 * Text already within budget is returned unchanged, which makes the
 * function idempotent.
 */
export function abbreviate(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;

  let result = text;
  for (const rule of SUBSTITUTIONS) {
    if (result.length <= maxLength) return result;
    result = applyRule(result, rule);
  }
  if (result.length <= maxLength) return result;

  result = contractFurther(result);
  return fitToLength(result, maxLength);
}

export interface AddressLimits {
  street: number;
  locality: number;
}

/**
 * Fit street and locality to the carrier maxima.
 * Postal code and province are copied untouched.
 */
export function abbreviateAddress(
  address: NormalizedAddress,
  limits: AddressLimits = { street: MAX_STREET_LENGTH, locality: MAX_LOCALITY_LENGTH }
): AbbreviatedAddress {
  const street = abbreviate(address.street, limits.street);
  const locality = abbreviate(address.locality, limits.locality);
  return {
    ...address,
    street,
    locality,
    abbreviated: street !== address.street || locality !== address.locality,
  };
}
