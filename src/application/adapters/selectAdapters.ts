import type { Host, Item } from '../../shared/schema/resources.js';
import { FEATURE } from '../version/features.js';
import type { VersionManager } from '../version/VersionManager.js';
import { CurrentHostCodec, LegacyHostCodec } from './HostCodec.js';
import { CurrentItemCodec, LegacyItemCodec } from './ItemCodec.js';
import type { ShapedCodec } from './ResourceCodec.js';

export type AdapterSet = {
  readonly item: ShapedCodec<Item>;
  readonly host: ShapedCodec<Host>;
};

/** Pure function of the detected version; called once per version change. */
export const selectAdapters = (versions: VersionManager): AdapterSet => ({
  item: versions.isFeatureSupported(FEATURE.HEADERS_V7) ? new CurrentItemCodec() : new LegacyItemCodec(),
  host: versions.isFeatureSupported(FEATURE.PROXY_ID) ? new CurrentHostCodec() : new LegacyHostCodec()
});
