/**
 * String cleanup helpers
 */

import { DEFAULT_TRUNCATE_SUFFIX } from '../config';
import { InvalidArgumentError } from '../errors';

/**
 * Strip surrounding whitespace and collapse internal runs to one space
 */
export const clean = (s: string): string => s.trim().split(/\s+/).filter(Boolean).join(' ');

/**
 * URL-safe slug: "Hello, World!" -> "hello-world"
 */
export const slugify = (s: string): string =>
  s
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s_-]+/g, '-');

/**
 * Text between the first `left` and the next `right` after it.
 * Empty when `left` does not occur; the rest of the string when `right` does not.
 */
export function between(s: string, left: string, right: string): string {
  const start = s.indexOf(left);
  if (start === -1) return '';
  const rest = s.slice(start + left.length);
  const end = rest.indexOf(right);
  return end === -1 ? rest : rest.slice(0, end);
}

/**
 * Shorten s to at most `length` characters, ending with `suffix` when cut
 */
export function truncate(
  s: string,
  length: number,
  suffix: string = DEFAULT_TRUNCATE_SUFFIX
): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidArgumentError(`truncate(): length must be positive (got ${length})`);
  }
  if (s.length <= length) return s;
  if (length <= suffix.length) return suffix.slice(0, length);
  return s.slice(0, length - suffix.length) + suffix;
}
