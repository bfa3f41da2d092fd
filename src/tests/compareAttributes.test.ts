import { describe, it, expect } from 'vitest';
import { compareAttributes, attributeKeys, concatResults } from '../transform/compareAttributes.ts';

describe('compareAttributes', () => {
  it('reports required keys that were not observed', () => {
    const result = compareAttributes(
      new Set(['http.method', 'http.status_code']),
      ['http.method']
    );
    expect(result).toEqual({ missing: ['http.status_code'], extra: [] });
  });

  it('reports observed keys that are not required', () => {
    const result = compareAttributes(new Set(['a']), ['a', 'b', 'c']);
    expect(result).toEqual({ missing: [], extra: ['b', 'c'] });
  });

  it('drops ignored keys from both lists', () => {
    const result = compareAttributes(new Set(['a', 'b']), ['c', 'd'], new Set(['b', 'd']));
    expect(result).toEqual({ missing: ['a'], extra: ['c'] });
  });

  it('yields nothing when the ignore set covers every key', () => {
    const result = compareAttributes(new Set(['a', 'b']), ['c', 'a'], new Set(['a', 'b', 'c']));
    expect(result).toEqual({ missing: [], extra: [] });
  });

  it('counts a duplicated observed key once', () => {
    const result = compareAttributes(new Set(['a']), ['b', 'b', 'a', 'b']);
    expect(result).toEqual({ missing: [], extra: ['b'] });
  });

  it('with nothing required, extra is observed minus ignore', () => {
    const result = compareAttributes(new Set(), ['x', 'y', 'z'], new Set(['y']));
    expect(result).toEqual({ missing: [], extra: ['x', 'z'] });
  });

  it('treats absent observed attributes as an empty set', () => {
    expect(compareAttributes(new Set(['a', 'b']), undefined, new Set(['b']))).toEqual({
      missing: ['a'],
      extra: [],
    });
    expect(compareAttributes(new Set(['a']), null)).toEqual({ missing: ['a'], extra: [] });
  });

  it('keeps first-seen order and is deterministic', () => {
    const required = new Set(['z', 'm', 'a']);
    const observed = ['q', 'b', 'q', 'k'];
    const first = compareAttributes(required, observed);
    const second = compareAttributes(required, observed);
    expect(first).toEqual({ missing: ['z', 'm', 'a'], extra: ['q', 'b', 'k'] });
    expect(second).toEqual(first);
  });

  it('never reports a key as both missing and extra', () => {
    const required = new Set(['a', 'b', 'c']);
    const observed = ['b', 'd', 'e', 'a'];
    const { missing, extra } = compareAttributes(required, observed, new Set(['e']));
    expect(missing).toEqual(['c']);
    expect(extra).toEqual(['d']);
    expect(missing.filter((k) => extra.includes(k))).toEqual([]);
  });
});

describe('attributeKeys', () => {
  it('extracts keys in order and skips null entries', () => {
    expect(
      attributeKeys([
        { key: 'a', value: { stringValue: '1' } },
        null,
        { key: 'b', value: { intValue: 2 } },
      ])
    ).toEqual(['a', 'b']);
  });

  it('returns an empty list for absent attributes', () => {
    expect(attributeKeys(undefined)).toEqual([]);
    expect(attributeKeys(null)).toEqual([]);
  });
});

describe('concatResults', () => {
  it('concatenates missing and extra lists in order', () => {
    expect(
      concatResults([
        { missing: ['a'], extra: ['x'] },
        { missing: ['a', 'b'], extra: [] },
      ])
    ).toEqual({ missing: ['a', 'a', 'b'], extra: ['x'] });
  });
});
