import type { ResourceFamily } from '../../shared/schema/config.js';
import { FEATURE, type FeatureName } from '../version/features.js';

/** Where a family lives on the wire and how its ids are named. */
export type ResourceDescriptor = {
  family: ResourceFamily;
  /** Method prefix: `<api>.get`, `<api>.create`, ... */
  api: string;
  /** Id field on each record. */
  idField: string;
  /** Id list parameter of `get` and result key of `create`/`update`/`delete`. */
  idsKey: string;
  /** Result key of `delete` when it differs from `idsKey`. */
  deleteIdsKey?: string;
  /** Feature the server must have for any call on this family. */
  feature?: FeatureName;
};

export const RESOURCE_CATALOG = {
  host: { family: 'host', api: 'host', idField: 'hostid', idsKey: 'hostids' },
  hostprototype: { family: 'hostprototype', api: 'hostprototype', idField: 'hostid', idsKey: 'hostids' },
  hostgroup: { family: 'hostgroup', api: 'hostgroup', idField: 'groupid', idsKey: 'groupids' },
  item: { family: 'item', api: 'item', idField: 'itemid', idsKey: 'itemids' },
  itemprototype: {
    family: 'itemprototype',
    api: 'itemprototype',
    idField: 'itemid',
    idsKey: 'itemids',
    deleteIdsKey: 'prototypeids'
  },
  user: { family: 'user', api: 'user', idField: 'userid', idsKey: 'userids' },
  mediatype: { family: 'mediatype', api: 'mediatype', idField: 'mediatypeid', idsKey: 'mediatypeids' },
  mfa: { family: 'mfa', api: 'mfa', idField: 'mfaid', idsKey: 'mfaids', feature: FEATURE.MFA },
  proxygroup: {
    family: 'proxygroup',
    api: 'proxygroup',
    idField: 'proxy_groupid',
    idsKey: 'proxy_groupids',
    feature: FEATURE.PROXY_GROUP
  },
  alert: { family: 'alert', api: 'alert', idField: 'alertid', idsKey: 'alertids' }
} satisfies Record<ResourceFamily, ResourceDescriptor>;
