import { AppError } from '../../shared/errors/AppError.js';
import { CardinalityError, CountMismatchError } from '../../shared/errors/CardinalityError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { UnsupportedFeatureError } from '../../shared/errors/UnsupportedFeatureError.js';
import { resourceIdSchema, type Output, type Params } from '../../shared/schema/common.js';
import type { VersionManager } from '../version/VersionManager.js';
import type { ResourceAdapter } from './ResourceAdapter.js';

export type OperationsContext = {
  versions: VersionManager;
  /** `output` added to `get` filters that carry none. */
  output: Output;
};

/** Read-only side of a family. */
export class ResourceReader<T extends Params> {
  public constructor(
    protected readonly adapter: ResourceAdapter<T>,
    protected readonly context: OperationsContext
  ) {}

  public get family(): string {
    return this.adapter.descriptor.family;
  }

  public async get(filter: Params = {}): Promise<T[]> {
    this.assertSupported();
    const params = filter.output === undefined ? { ...filter, output: this.context.output } : filter;
    return this.adapter.get(params);
  }

  /** Fetches the one record with this id; any other match count is a CardinalityError. */
  public async getById(id: string): Promise<T> {
    const { idsKey, family } = this.adapter.descriptor;
    const found = await this.get({ [idsKey]: [id] });
    const [record] = found;
    if (found.length !== 1 || record === undefined) {
      throw new CardinalityError(found.length, { family, id });
    }
    return record;
  }

  protected assertSupported(): void {
    const { feature } = this.adapter.descriptor;
    if (feature !== undefined && !this.context.versions.isFeatureSupported(feature)) {
      throw new UnsupportedFeatureError(feature, this.context.versions.version);
    }
  }

  protected readId(payload: T): string {
    const { idField, family } = this.adapter.descriptor;
    const id = resourceIdSchema.safeParse(payload[idField]);
    if (!id.success) {
      throw new AppError(`${family} payload has no ${idField}.`, {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: { family, idField },
        suggestions: [`Fetch the ${family} first or set ${idField}.`]
      });
    }
    return id.data;
  }
}

/**
 * Full CRUD for a family. `create` and `update` write the ids the server
 * returns back into the given payloads; `delete` removes them.
 */
export class ResourceOperations<T extends Params> extends ResourceReader<T> {
  public async create(payloads: T[]): Promise<T[]> {
    this.assertSupported();
    const ids = await this.adapter.create(payloads);
    this.assignIds('create', payloads, ids);
    return payloads;
  }

  public async update(payloads: T[]): Promise<T[]> {
    this.assertSupported();
    payloads.forEach((payload) => this.readId(payload));
    const ids = await this.adapter.update(payloads);
    this.assignIds('update', payloads, ids);
    return payloads;
  }

  public async delete(payloads: T[]): Promise<void> {
    this.assertSupported();
    const ids = payloads.map((payload) => this.readId(payload));
    await this.deleteByIds(ids);

    const { idField } = this.adapter.descriptor;
    for (const payload of payloads) {
      Reflect.deleteProperty(payload, idField);
    }
  }

  public async deleteByIds(ids: string[]): Promise<string[]> {
    this.assertSupported();
    const deleted = await this.adapter.delete(ids);
    if (deleted.length !== ids.length) {
      throw new CountMismatchError(ids.length, deleted.length, { family: this.family, action: 'delete' });
    }
    return deleted;
  }

  private assignIds(action: string, payloads: T[], ids: string[]): void {
    if (ids.length !== payloads.length) {
      throw new CountMismatchError(payloads.length, ids.length, { family: this.family, action });
    }

    const { idField } = this.adapter.descriptor;
    payloads.forEach((payload, index) => {
      Object.assign(payload, { [idField]: ids[index] });
    });
  }
}
