import { MONITORED_BY, type MonitoredBy } from '../../shared/schema/resources.js';

/** "0" is how both majors spell "no proxy". */
export const NO_PROXY = '0';

export type CurrentProxyReference = {
  proxyid: string;
  monitored_by: MonitoredBy;
};

export const hasProxy = (id: string | undefined): id is string => id !== undefined && id !== NO_PROXY;

export const legacyToCurrentProxy = (proxyHostId: string): CurrentProxyReference => ({
  proxyid: proxyHostId,
  monitored_by: hasProxy(proxyHostId) ? MONITORED_BY.PROXY : MONITORED_BY.SERVER
});

/**
 * Hosts monitored through a proxy group have no older equivalent and read
 * as "no proxy".
 */
export const currentToLegacyProxy = (reference: CurrentProxyReference): string =>
  reference.monitored_by === MONITORED_BY.PROXY && hasProxy(reference.proxyid) ? reference.proxyid : NO_PROXY;
