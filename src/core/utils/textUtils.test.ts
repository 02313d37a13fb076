import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../errors';
import { between, clean, slugify, truncate } from './textUtils';

describe('clean', () => {
  it('trims and collapses whitespace', () => {
    expect(clean('  hello   world \n')).toBe('hello world');
    expect(clean('a\t\tb\nc')).toBe('a b c');
  });

  it('returns an empty string for blank input', () => {
    expect(clean('')).toBe('');
    expect(clean('   ')).toBe('');
  });
});

describe('slugify', () => {
  it('lowercases and drops punctuation', () => {
    expect(slugify('Hello, World!')).toBe('hello-world');
  });

  it('collapses separators', () => {
    expect(slugify('  Foo_bar--baz  ')).toBe('foo-bar-baz');
  });

  it('keeps non-ASCII letters', () => {
    expect(slugify('Crème Brûlée')).toBe('crème-brûlée');
  });
});

describe('between', () => {
  it('extracts text between markers', () => {
    expect(between('key=[value];', '[', ']')).toBe('value');
  });

  it('uses the first occurrences', () => {
    expect(between('<a><b>', '<', '>')).toBe('a');
  });

  it('returns an empty string when the left marker is missing', () => {
    expect(between('abc', 'x', 'y')).toBe('');
  });

  it('returns the rest when the right marker is missing', () => {
    expect(between('a[b', '[', ']')).toBe('b');
  });
});

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('exact', 5)).toBe('exact');
  });

  it('cuts to the requested length including the suffix', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
  });

  it('accepts a custom suffix', () => {
    expect(truncate('hello world', 6, '…')).toBe('hello…');
  });

  it('shortens the suffix when there is no room for text', () => {
    expect(truncate('hello world', 2)).toBe('..');
  });

  it('rejects non-positive lengths', () => {
    expect(() => truncate('x', 0)).toThrow(InvalidArgumentError);
  });
});
