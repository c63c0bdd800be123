import { z } from 'zod';

import { DecodeError } from '../../shared/errors/DecodeError.js';
import { nameValueMapSchema, nameValuePairSchema, type NameValueMap, type NameValuePair } from '../../shared/schema/common.js';

/*
 * Name/value collections travel either as an object (`{ "Accept": "text/html" }`)
 * or as an ordered list (`[{ "name": "Accept", "value": "text/html" }]`).
 * map -> list -> map yields an equal map. list -> map -> list yields the input
 * list only when no name repeats and no name is an integer-like string:
 * objects iterate keys such as "10" first, in ascending numeric order.
 */

export const mapToList = (map: NameValueMap): NameValuePair[] =>
  Object.entries(map).map(([name, value]) => ({ name, value }));

export const findDuplicateName = (list: readonly NameValuePair[]): string | undefined => {
  const seen = new Set<string>();
  for (const { name } of list) {
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return undefined;
};

/** A repeated name keeps its last value. Outbound callers check findDuplicateName() first. */
export const listToMap = (list: readonly NameValuePair[]): NameValueMap =>
  Object.fromEntries(list.map(({ name, value }) => [name, value]));

export type NameValueBoth = {
  map: NameValueMap;
  list: NameValuePair[];
};

const nameValueListSchema = z.array(nameValuePairSchema);

/**
 * Sniffs the wire shape of `raw` and returns it in both representations.
 * A list is returned exactly as received.
 * `undefined` when the server did not send the field at all.
 */
export const decodeNameValue = (field: string, raw: unknown): NameValueBoth | undefined => {
  if (raw === undefined || raw === null) {
    return undefined;
  }

  if (Array.isArray(raw)) {
    const parsed = nameValueListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(`${field} list entries must be { name, value } strings.`, {
        field,
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    // The server may repeat a name. The list stays as sent; the map keeps the last value.
    return { map: listToMap(parsed.data), list: parsed.data };
  }

  if (typeof raw === 'object') {
    const parsed = nameValueMapSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(`${field} object values must be strings.`, {
        field,
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    return { map: parsed.data, list: mapToList(parsed.data) };
  }

  throw new DecodeError(`${field} is neither an object nor a list.`, { field, received: typeof raw });
};
