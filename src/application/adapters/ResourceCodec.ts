import type { z } from 'zod';

import { DecodeError } from '../../shared/errors/DecodeError.js';
import type { Params } from '../../shared/schema/common.js';

export type WireShape = 'legacy' | 'current';

/** Whether a payload is about to be created or updated; some defaults only apply on create. */
export type WriteMode = 'create' | 'update';

/** Converts one resource family between the caller-facing payload and a wire record. */
export interface ResourceCodec<T> {
  toWire(payload: T, mode: WriteMode): Params;
  fromWire(raw: unknown): T;
}

/** Codec for one wire shape of a family whose format differs between server majors. */
export interface ShapedCodec<T> extends ResourceCodec<T> {
  readonly shape: WireShape;
  /**
   * Copy of `payload` with every dual field held only in the representation
   * this shape transmits.
   */
  normalize(payload: T, mode: WriteMode): T;
}

export const parseWireRecord = <T>(family: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(`Unexpected ${family} record.`, {
      family,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    });
  }
  return parsed.data;
};

/** Families whose wire format is the same on every supported server. */
export class SchemaCodec<T extends Params> implements ResourceCodec<T> {
  public constructor(
    private readonly family: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  public toWire(payload: T): Params {
    return { ...payload };
  }

  public fromWire(raw: unknown): T {
    return parseWireRecord(this.family, this.schema, raw);
  }
}
