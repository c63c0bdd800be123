import { z } from 'zod';

import { loadConfigFromEnv, parseClientConfig } from '../shared/config.js';
import { AppError } from '../shared/errors/AppError.js';
import { DecodeError } from '../shared/errors/DecodeError.js';
import { ERROR_CODE } from '../shared/errors/ErrorCode.js';
import { UnsupportedFeatureError } from '../shared/errors/UnsupportedFeatureError.js';
import { idListSchema, type Output, type Params } from '../shared/schema/common.js';
import type { ClientConfig, ClientConfigInput, ResourceFamily } from '../shared/schema/config.js';
import {
  ITEM_TYPE,
  alertSchema,
  historyPushResultSchema,
  historyRecordSchema,
  hostGroupSchema,
  hostPrototypeSchema,
  mediaTypeSchema,
  mfaSchema,
  proxyGroupSchema,
  userSchema,
  type Alert,
  type HistoryPushResult,
  type HistoryRecord,
  type Host,
  type HostGroup,
  type HostPrototype,
  type Item,
  type MediaType,
  type Mfa,
  type ProxyGroup,
  type User
} from '../shared/schema/resources.js';
import { FetchPoster, type HttpPoster } from '../infrastructure/rpc/HttpPoster.js';
import { RpcCaller } from '../infrastructure/rpc/RpcCaller.js';
import { noopTraceSink, type TraceSink } from '../infrastructure/trace/TraceSink.js';
import { SchemaCodec, type ResourceCodec } from './adapters/ResourceCodec.js';
import { RESOURCE_CATALOG } from './resources/catalog.js';
import { ResourceAdapter } from './resources/ResourceAdapter.js';
import { ResourceOperations, ResourceReader } from './resources/ResourceOperations.js';
import { Session } from './session/Session.js';
import { FEATURE, type FeatureName } from './version/features.js';
import { VersionManager } from './version/VersionManager.js';

export type ClientOptions = {
  /** Replaces the fetch-based poster, e.g. with a fake server in tests. */
  poster?: HttpPoster;
  trace?: TraceSink;
};

const resultObjectSchema = z.record(z.string(), z.unknown());

const schemaCodec = <T extends Params>(
  family: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (() => ResourceCodec<T>) => {
  const codec = new SchemaCodec(family, schema);
  return () => codec;
};

export class ZabbixClient {
  public readonly config: ClientConfig;
  public readonly caller: RpcCaller;
  public readonly session: Session;

  public readonly hosts: ResourceOperations<Host>;
  public readonly hostPrototypes: ResourceOperations<HostPrototype>;
  public readonly hostGroups: ResourceOperations<HostGroup>;
  public readonly items: ResourceOperations<Item>;
  public readonly itemPrototypes: ResourceOperations<Item>;
  public readonly users: ResourceOperations<User>;
  public readonly mediaTypes: ResourceOperations<MediaType>;
  public readonly mfa: ResourceOperations<Mfa>;
  public readonly proxyGroups: ResourceOperations<ProxyGroup>;
  public readonly alerts: ResourceReader<Alert>;

  public constructor(config: ClientConfigInput, options: ClientOptions = {}) {
    this.config = parseClientConfig(config);
    const trace = options.trace ?? noopTraceSink;

    this.caller = new RpcCaller({
      url: this.config.url,
      poster: options.poster ?? new FetchPoster({ timeoutMs: this.config.timeoutMs }),
      trace,
      serialize: this.config.serialize,
      userAgent: this.config.userAgent
    });
    this.session = new Session({ caller: this.caller, versions: new VersionManager(), trace });
    if (this.config.version) {
      this.session.forceVersion(this.config.version);
    }

    const itemCodec = () => this.session.adapters.item;
    this.hosts = this.operations('host', () => this.session.adapters.host);
    this.items = this.operations('item', itemCodec);
    this.itemPrototypes = this.operations('itemprototype', itemCodec);
    this.hostPrototypes = this.operations('hostprototype', schemaCodec('hostprototype', hostPrototypeSchema));
    this.hostGroups = this.operations('hostgroup', schemaCodec('hostgroup', hostGroupSchema));
    this.users = this.operations('user', schemaCodec('user', userSchema));
    this.mediaTypes = this.operations('mediatype', schemaCodec('mediatype', mediaTypeSchema));
    this.mfa = this.operations('mfa', schemaCodec('mfa', mfaSchema));
    this.proxyGroups = this.operations('proxygroup', schemaCodec('proxygroup', proxyGroupSchema));
    this.alerts = new ResourceReader(
      new ResourceAdapter(RESOURCE_CATALOG.alert, schemaCodec('alert', alertSchema), this.session),
      { versions: this.versions, output: this.outputFor('alert') }
    );
  }

  /** Client configured from ZABBIX_* environment variables. */
  public static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<ClientConfigInput> = {},
    options: ClientOptions = {}
  ): ZabbixClient {
    return new ZabbixClient(loadConfigFromEnv(env, overrides), options);
  }

  public get versions(): VersionManager {
    return this.session.versions;
  }

  public login(user: string, password: string): Promise<string> {
    return this.session.login(user, password);
  }

  public logout(): Promise<void> {
    return this.session.logout();
  }

  /** Server version as reported right now; does not change the detected version. */
  public apiVersion(): Promise<string> {
    return VersionManager.query(this.caller);
  }

  /** Sends values to trapper and HTTP agent items. */
  public async historyPush(records: HistoryRecord[]): Promise<HistoryPushResult> {
    this.requireFeature(FEATURE.HISTORY_PUSH);
    const params = records.map((record) => {
      const parsed = historyRecordSchema.safeParse(record);
      if (!parsed.success) {
        throw new AppError('Invalid history record.', {
          code: ERROR_CODE.VALIDATION_ERROR,
          details: { issues: parsed.error.issues.map((issue) => issue.message) }
        });
      }
      return parsed.data;
    });

    const result = await this.session.call('history.push', params);
    const parsed = historyPushResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new DecodeError('history.push returned an unexpected result.', { result });
    }
    return parsed.data;
  }

  /** Clears the enrolled TOTP secret of each user. */
  public async resetUserTotp(userIds: string[]): Promise<string[]> {
    this.requireFeature(FEATURE.MFA);
    const result = await this.session.call('user.resettotp', userIds);
    const body = resultObjectSchema.safeParse(result);
    const ids = body.success ? idListSchema.safeParse(body.data.userids) : undefined;
    if (!ids?.success) {
      throw new DecodeError('user.resettotp did not return userids.', { result });
    }
    return ids.data;
  }

  /** Creates the items as browser items; their `type` is set accordingly. */
  public async createBrowserItems(items: Item[]): Promise<Item[]> {
    this.requireFeature(FEATURE.BROWSER_ITEM);
    for (const item of items) {
      item.type = ITEM_TYPE.BROWSER;
    }
    return this.items.create(items);
  }

  public async getBrowserItems(filter: Params = {}): Promise<Item[]> {
    this.requireFeature(FEATURE.BROWSER_ITEM);
    const inner = resultObjectSchema.safeParse(filter.filter);
    return this.items.get({
      ...filter,
      filter: { ...(inner.success ? inner.data : {}), type: ITEM_TYPE.BROWSER }
    });
  }

  private requireFeature(feature: FeatureName): void {
    if (!this.versions.isFeatureSupported(feature)) {
      throw new UnsupportedFeatureError(feature, this.versions.version);
    }
  }

  private outputFor(family: ResourceFamily): Output {
    return this.config.outputOverrides[family] ?? this.config.defaultOutput;
  }

  private operations<T extends Params>(family: ResourceFamily, codec: () => ResourceCodec<T>): ResourceOperations<T> {
    return new ResourceOperations(new ResourceAdapter(RESOURCE_CATALOG[family], codec, this.session), {
      versions: this.versions,
      output: this.outputFor(family)
    });
  }
}
