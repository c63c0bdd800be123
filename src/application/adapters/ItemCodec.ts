import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { NameValueMap, NameValuePair, Params } from '../../shared/schema/common.js';
import { itemWireSchema, type Item } from '../../shared/schema/resources.js';
import { decodeNameValue, findDuplicateName, listToMap, mapToList } from './nameValue.js';
import { parseWireRecord, type ShapedCodec, type WireShape, type WriteMode } from './ResourceCodec.js';

type DualField = {
  wire: 'headers' | 'query_fields';
  map: 'headerMap' | 'queryFieldMap';
  list: 'headerList' | 'queryFieldList';
};

const DUAL_FIELDS: readonly DualField[] = [
  { wire: 'headers', map: 'headerMap', list: 'headerList' },
  { wire: 'query_fields', map: 'queryFieldMap', list: 'queryFieldList' }
];

const toMapChecked = (field: string, list: NameValuePair[]): NameValueMap => {
  const duplicate = findDuplicateName(list);
  if (duplicate !== undefined) {
    throw new AppError(`${field} repeats the name "${duplicate}", which the server's object form cannot hold.`, {
      code: ERROR_CODE.VALIDATION_ERROR,
      details: { field, duplicate },
      suggestions: [`Give every ${field} entry a distinct name.`]
    });
  }
  return listToMap(list);
};

/**
 * Inbound decoding is shared: whatever shape the server used, both
 * representations of every dual field are filled.
 */
abstract class ItemCodecBase implements ShapedCodec<Item> {
  public abstract readonly shape: WireShape;

  public abstract normalize(payload: Item, mode: WriteMode): Item;

  public toWire(payload: Item, mode: WriteMode): Params {
    const normalized = this.normalize(payload, mode);
    const { headerMap, headerList, queryFieldMap, queryFieldList, ...rest } = normalized;
    const wire: Params = { ...rest };

    const headers = this.shape === 'current' ? headerList : headerMap;
    const queryFields = this.shape === 'current' ? queryFieldList : queryFieldMap;
    if (headers !== undefined) {
      wire.headers = headers;
    }
    if (queryFields !== undefined) {
      wire.query_fields = queryFields;
    }

    return wire;
  }

  public fromWire(raw: unknown): Item {
    const { headers, query_fields: queryFields, ...rest } = parseWireRecord('item', itemWireSchema, raw);
    const item: Item = { ...rest };

    const decodedHeaders = decodeNameValue('headers', headers);
    if (decodedHeaders) {
      item.headerMap = decodedHeaders.map;
      item.headerList = decodedHeaders.list;
    }

    const decodedQueryFields = decodeNameValue('query_fields', queryFields);
    if (decodedQueryFields) {
      item.queryFieldMap = decodedQueryFields.map;
      item.queryFieldList = decodedQueryFields.list;
    }

    return item;
  }
}

/** Servers before 7.0: headers and query fields are objects. */
export class LegacyItemCodec extends ItemCodecBase {
  public readonly shape = 'legacy';

  public normalize(payload: Item): Item {
    const normalized: Item = { ...payload };

    for (const field of DUAL_FIELDS) {
      const map = payload[field.map];
      const list = payload[field.list];
      delete normalized[field.list];
      if (map !== undefined) {
        normalized[field.map] = { ...map };
      } else if (list !== undefined) {
        normalized[field.map] = toMapChecked(field.wire, list);
      }
    }

    return normalized;
  }
}

/** 7.0 and later: headers and query fields are `{ name, value }` lists. */
export class CurrentItemCodec extends ItemCodecBase {
  public readonly shape = 'current';

  public normalize(payload: Item): Item {
    const normalized: Item = { ...payload };

    for (const field of DUAL_FIELDS) {
      const map = payload[field.map];
      const list = payload[field.list];
      delete normalized[field.map];
      if (list !== undefined) {
        normalized[field.list] = list.map((pair) => ({ ...pair }));
      } else if (map !== undefined) {
        normalized[field.list] = mapToList(map);
      }
    }

    return normalized;
  }
}
