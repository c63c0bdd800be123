import { describe, expect, it } from 'vitest';

import { CurrentItemCodec, LegacyItemCodec } from '../../src/application/adapters/ItemCodec.js';
import { DecodeError } from '../../src/shared/errors/DecodeError.js';
import type { Item } from '../../src/shared/schema/resources.js';

const current = new CurrentItemCodec();
const legacy = new LegacyItemCodec();

describe('CurrentItemCodec', () => {
  it('moves a header map into the list form and clears the map', () => {
    const normalized = current.normalize({ name: 'web', headerMap: { Accept: 'text/html' } });

    expect(normalized.headerList).toEqual([{ name: 'Accept', value: 'text/html' }]);
    expect(normalized).not.toHaveProperty('headerMap');
  });

  it('sends headers as a list', () => {
    expect(current.toWire({ name: 'web', headerMap: { Accept: 'text/html' } }, 'create')).toEqual({
      name: 'web',
      headers: [{ name: 'Accept', value: 'text/html' }]
    });
  });

  it('prefers the list when both forms are given', () => {
    const wire = current.toWire(
      {
        headerMap: { Accept: 'ignored' },
        headerList: [{ name: 'Accept', value: 'application/json' }],
        queryFieldMap: { q: '1' }
      },
      'update'
    );

    expect(wire).toEqual({
      headers: [{ name: 'Accept', value: 'application/json' }],
      query_fields: [{ name: 'q', value: '1' }]
    });
  });

  it('keeps repeated names, which only the list form can hold', () => {
    const list = [
      { name: 'tag', value: 'a' },
      { name: 'tag', value: 'b' }
    ];

    expect(current.toWire({ queryFieldList: list }, 'create')).toEqual({ query_fields: list });
  });

  it('sends an empty list when the caller set an empty map', () => {
    expect(current.toWire({ headerMap: {} }, 'update')).toEqual({ headers: [] });
  });

  it('leaves untouched fields off the wire', () => {
    expect(current.toWire({ itemid: '5', delay: '1m' }, 'update')).toEqual({ itemid: '5', delay: '1m' });
  });

  it('does not change the caller payload', () => {
    const payload: Item = { headerMap: { Accept: 'text/html' } };
    current.toWire(payload, 'create');

    expect(payload).toEqual({ headerMap: { Accept: 'text/html' } });
  });
});

describe('LegacyItemCodec', () => {
  it('sends headers as an object', () => {
    expect(
      legacy.toWire(
        {
          name: 'api',
          headerList: [{ name: 'Accept', value: 'text/html' }],
          queryFieldList: [{ name: 'page', value: '2' }]
        },
        'create'
      )
    ).toEqual({
      name: 'api',
      headers: { Accept: 'text/html' },
      query_fields: { page: '2' }
    });
  });

  it('prefers the map when both forms are given', () => {
    expect(
      legacy.toWire({ headerMap: { A: '1' }, headerList: [{ name: 'B', value: '2' }] }, 'update')
    ).toEqual({ headers: { A: '1' } });
  });

  it('refuses a list with repeated names', () => {
    const payload: Item = {
      headerList: [
        { name: 'Accept', value: 'a' },
        { name: 'Accept', value: 'b' }
      ]
    };

    let caught: unknown;
    try {
      legacy.toWire(payload, 'create');
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: 'VALIDATION_ERROR', details: { field: 'headers', duplicate: 'Accept' } });
  });

  it('reports its shape', () => {
    expect(legacy.shape).toBe('legacy');
    expect(current.shape).toBe('current');
  });
});

describe('item decoding', () => {
  it('fills both forms from an object-shaped record', () => {
    const item = legacy.fromWire({
      itemid: '10',
      type: '19',
      headers: { Accept: 'text/html' },
      query_fields: []
    });

    expect(item).toEqual({
      itemid: '10',
      type: 19,
      headerMap: { Accept: 'text/html' },
      headerList: [{ name: 'Accept', value: 'text/html' }],
      queryFieldMap: {},
      queryFieldList: []
    });
  });

  it('decodes either shape whichever codec is selected', () => {
    const record = { itemid: '11', headers: [{ name: 'Accept', value: 'text/html' }], custom_field: 'kept' };

    expect(legacy.fromWire(record)).toEqual(current.fromWire(record));
    expect(current.fromWire(record)).toMatchObject({ headerMap: { Accept: 'text/html' }, custom_field: 'kept' });
  });

  it('fails on a headers value of neither shape', () => {
    expect(() => current.fromWire({ itemid: '12', headers: 'Accept: text/html' })).toThrow(DecodeError);
  });

  it('fails on a record that is not an object', () => {
    expect(() => current.fromWire('12')).toThrow('Unexpected item record.');
  });

  it('reads what the matching codec sent', () => {
    const payload: Item = { name: 'web', headerMap: { Accept: 'text/html', 'X-Id': '7' } };

    const decoded = current.fromWire(current.toWire(payload, 'create'));

    expect(decoded.headerMap).toEqual(payload.headerMap);
    expect(decoded.headerList).toEqual([
      { name: 'Accept', value: 'text/html' },
      { name: 'X-Id', value: '7' }
    ]);
  });
});
