import { describe, expect, it } from 'vitest';

import { decodeNameValue, findDuplicateName, listToMap, mapToList } from '../../src/application/adapters/nameValue.js';
import { DecodeError } from '../../src/shared/errors/DecodeError.js';

describe('name/value conversions', () => {
  it('turns a map into a list in insertion order', () => {
    expect(mapToList({ Accept: 'text/html', 'X-Trace': 'on' })).toEqual([
      { name: 'Accept', value: 'text/html' },
      { name: 'X-Trace', value: 'on' }
    ]);
  });

  it('comes back to the same map through a list', () => {
    const map = { b: '2', a: '1', c: '' };

    expect(listToMap(mapToList(map))).toEqual(map);
    expect(Object.keys(listToMap(mapToList(map)))).toEqual(['b', 'a', 'c']);
  });

  it('comes back to the same list through a map when names are distinct', () => {
    const list = [
      { name: 'page', value: '1' },
      { name: 'limit', value: '50' }
    ];

    expect(mapToList(listToMap(list))).toEqual(list);
  });

  it('orders integer-like names first once a list passes through a map', () => {
    const list = [
      { name: 'x', value: 'a' },
      { name: '10', value: 'b' },
      { name: '2', value: 'c' }
    ];

    expect(Object.keys(listToMap(list))).toEqual(['2', '10', 'x']);
    expect(mapToList(listToMap(list))).toEqual([
      { name: '2', value: 'c' },
      { name: '10', value: 'b' },
      { name: 'x', value: 'a' }
    ]);
  });

  it('keeps the last value when a list repeats a name', () => {
    expect(
      listToMap([
        { name: 'a', value: '1' },
        { name: 'a', value: '2' }
      ])
    ).toEqual({ a: '2' });
  });

  it('finds the first repeated name', () => {
    expect(
      findDuplicateName([
        { name: 'a', value: '1' },
        { name: 'b', value: '2' },
        { name: 'a', value: '3' }
      ])
    ).toBe('a');
    expect(findDuplicateName([{ name: 'a', value: '1' }])).toBeUndefined();
  });

  it('converts empty collections to empty collections', () => {
    expect(mapToList({})).toEqual([]);
    expect(listToMap([])).toEqual({});
  });
});

describe('decodeNameValue', () => {
  it('fills both shapes from an object', () => {
    expect(decodeNameValue('headers', { Accept: 'text/html' })).toEqual({
      map: { Accept: 'text/html' },
      list: [{ name: 'Accept', value: 'text/html' }]
    });
  });

  it('fills both shapes from a list', () => {
    expect(decodeNameValue('query_fields', [{ name: 'q', value: 'x' }])).toEqual({
      map: { q: 'x' },
      list: [{ name: 'q', value: 'x' }]
    });
  });

  it('returns undefined when the field is absent', () => {
    expect(decodeNameValue('headers', undefined)).toBeUndefined();
    expect(decodeNameValue('headers', null)).toBeUndefined();
  });

  it('rejects a scalar', () => {
    expect(() => decodeNameValue('headers', 'Accept: text/html')).toThrow(DecodeError);
  });

  it('rejects list entries without a value', () => {
    expect(() => decodeNameValue('headers', [{ name: 'Accept' }])).toThrow(
      'headers list entries must be { name, value } strings.'
    );
  });

  it('keeps a list that repeats a name and maps the last value', () => {
    expect(
      decodeNameValue('headers', [
        { name: 'Accept', value: 'a' },
        { name: 'Accept', value: 'b' }
      ])
    ).toEqual({
      map: { Accept: 'b' },
      list: [
        { name: 'Accept', value: 'a' },
        { name: 'Accept', value: 'b' }
      ]
    });
  });

  it('rejects object values that are not strings', () => {
    expect(() => decodeNameValue('headers', { Accept: 1 })).toThrow(DecodeError);
  });
});
