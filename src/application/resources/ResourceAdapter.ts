import { z } from 'zod';

import { DecodeError } from '../../shared/errors/DecodeError.js';
import { idListSchema, type Params } from '../../shared/schema/common.js';
import type { ResourceCodec } from '../adapters/ResourceCodec.js';
import type { RpcInvoker } from '../session/Session.js';
import type { ResourceDescriptor } from './catalog.js';

const resultObjectSchema = z.record(z.string(), z.unknown());

/**
 * Issues the raw `<api>.*` calls for one family. Payloads pass through the
 * codec, which is looked up on every call so that a version change between
 * calls takes effect.
 */
export class ResourceAdapter<T extends Params> {
  public constructor(
    public readonly descriptor: ResourceDescriptor,
    private readonly codec: () => ResourceCodec<T>,
    private readonly rpc: RpcInvoker
  ) {}

  public async get(params: Params): Promise<T[]> {
    const method = this.method('get');
    const codec = this.codec();
    const result = await this.rpc.call(method, params);
    if (!Array.isArray(result)) {
      throw new DecodeError(`${method} did not return a list.`, { method, resultType: typeof result });
    }
    return result.map((record) => codec.fromWire(record));
  }

  public async create(payloads: T[]): Promise<string[]> {
    const codec = this.codec();
    const wire = payloads.map((payload) => codec.toWire(payload, 'create'));
    return this.readIds('create', this.descriptor.idsKey, await this.rpc.call(this.method('create'), wire));
  }

  public async update(payloads: T[]): Promise<string[]> {
    const codec = this.codec();
    const wire = payloads.map((payload) => codec.toWire(payload, 'update'));
    return this.readIds('update', this.descriptor.idsKey, await this.rpc.call(this.method('update'), wire));
  }

  public async delete(ids: string[]): Promise<string[]> {
    const key = this.descriptor.deleteIdsKey ?? this.descriptor.idsKey;
    return this.readIds('delete', key, await this.rpc.call(this.method('delete'), ids));
  }

  private method(action: string): string {
    return `${this.descriptor.api}.${action}`;
  }

  private readIds(action: string, key: string, result: unknown): string[] {
    const method = this.method(action);
    const body = resultObjectSchema.safeParse(result);
    const ids = body.success ? idListSchema.safeParse(body.data[key]) : undefined;
    if (!ids?.success) {
      throw new DecodeError(`${method} did not return ${key}.`, { method, key });
    }
    return ids.data;
  }
}
