import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { Params } from '../../shared/schema/common.js';
import { MONITORED_BY, hostSchema, type Host } from '../../shared/schema/resources.js';
import { currentToLegacyProxy, hasProxy, legacyToCurrentProxy } from './proxyReference.js';
import { parseWireRecord, type ShapedCodec, type WireShape, type WriteMode } from './ResourceCodec.js';

/**
 * Both host codecs decode the same way: a record carrying only
 * `proxy_hostid` gains `proxyid` and `monitored_by`, and one carrying only
 * `proxyid` gains `proxy_hostid`.
 */
abstract class HostCodecBase implements ShapedCodec<Host> {
  public abstract readonly shape: WireShape;

  public abstract normalize(payload: Host, mode: WriteMode): Host;

  public toWire(payload: Host, mode: WriteMode): Params {
    return { ...this.normalize(payload, mode) };
  }

  public fromWire(raw: unknown): Host {
    const host = parseWireRecord('host', hostSchema, raw);

    if (host.proxyid === undefined && host.proxy_hostid !== undefined) {
      return { ...host, ...legacyToCurrentProxy(host.proxy_hostid) };
    }

    if (host.proxyid !== undefined) {
      const monitoredBy = host.monitored_by ?? legacyToCurrentProxy(host.proxyid).monitored_by;
      return {
        ...host,
        monitored_by: monitoredBy,
        proxy_hostid: host.proxy_hostid ?? currentToLegacyProxy({ proxyid: host.proxyid, monitored_by: monitoredBy })
      };
    }

    return host;
  }
}

/** Servers before 7.0 know the proxy only as `proxy_hostid`. */
export class LegacyHostCodec extends HostCodecBase {
  public readonly shape = 'legacy';

  public normalize(payload: Host): Host {
    const { proxyid, monitored_by: monitoredBy, proxy_groupid: proxyGroupId, ...rest } = payload;

    if (monitoredBy === MONITORED_BY.PROXY_GROUP || hasProxy(proxyGroupId)) {
      throw new AppError('Monitoring through a proxy group needs a server with proxy group support.', {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: { host: payload.host, proxy_groupid: proxyGroupId, monitored_by: monitoredBy },
        suggestions: ['Reference a single proxy with proxy_hostid or proxyid instead.']
      });
    }

    const proxyHostId = rest.proxy_hostid ?? proxyid;
    return proxyHostId === undefined ? rest : { ...rest, proxy_hostid: proxyHostId };
  }
}

/**
 * 7.0 and later: `proxyid` plus the mandatory `monitored_by`. When the caller
 * leaves `monitored_by` out it is derived from the reference being sent:
 * proxy id -> proxy, proxy group id -> proxy group, nothing -> server on
 * create and untouched on update.
 */
export class CurrentHostCodec extends HostCodecBase {
  public readonly shape = 'current';

  public normalize(payload: Host, mode: WriteMode): Host {
    const { proxy_hostid: proxyHostId, ...rest } = payload;
    const proxyId = rest.proxyid ?? proxyHostId;
    const normalized: Host = proxyId === undefined ? rest : { ...rest, proxyid: proxyId };

    if (normalized.monitored_by === undefined) {
      if (hasProxy(proxyId)) {
        normalized.monitored_by = MONITORED_BY.PROXY;
      } else if (hasProxy(normalized.proxy_groupid)) {
        normalized.monitored_by = MONITORED_BY.PROXY_GROUP;
      } else if (mode === 'create') {
        normalized.monitored_by = MONITORED_BY.SERVER;
      }
    }

    return normalized;
  }
}
