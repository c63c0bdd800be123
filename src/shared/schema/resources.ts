import { z } from 'zod';

import { numericFieldSchema, resourceIdSchema, type NameValueMap, type NameValuePair } from './common.js';

/*
 * Wire records as the server returns them. Every schema passes unknown
 * fields through untouched; only the fields this client reads or rewrites
 * are declared.
 */

const optionalId = resourceIdSchema.optional();

export const itemBaseSchema = z
  .object({
    itemid: optionalId,
    hostid: optionalId,
    interfaceid: optionalId,
    ruleid: optionalId,
    master_itemid: optionalId,
    name: z.string().optional(),
    key_: z.string().optional(),
    type: numericFieldSchema.optional(),
    value_type: numericFieldSchema.optional(),
    delay: z.string().optional(),
    url: z.string().optional(),
    params: z.string().optional()
  })
  .passthrough();

export const itemWireSchema = itemBaseSchema.extend({
  headers: z.unknown().optional(),
  query_fields: z.unknown().optional()
});

export type ItemBase = z.infer<typeof itemBaseSchema>;
export type ItemWireRecord = z.infer<typeof itemWireSchema>;

/**
 * Item payload as callers see it. `headers` and `query_fields` are exposed in
 * both wire shapes; on send only the shape the server expects is transmitted.
 */
export type Item = ItemBase & {
  headerMap?: NameValueMap;
  headerList?: NameValuePair[];
  queryFieldMap?: NameValueMap;
  queryFieldList?: NameValuePair[];
};

export const ITEM_TYPE = {
  ZABBIX_AGENT: 0,
  TRAPPER: 2,
  SIMPLE_CHECK: 3,
  INTERNAL: 5,
  AGENT_ACTIVE: 7,
  EXTERNAL: 10,
  DATABASE_MONITOR: 11,
  IPMI: 12,
  SSH: 13,
  TELNET: 14,
  CALCULATED: 15,
  JMX: 16,
  SNMP_TRAP: 17,
  DEPENDENT: 18,
  HTTP_AGENT: 19,
  SNMP_AGENT: 20,
  SCRIPT: 21,
  BROWSER: 22
} as const;

export const VALUE_TYPE = {
  FLOAT: 0,
  CHARACTER: 1,
  LOG: 2,
  UNSIGNED: 3,
  TEXT: 4,
  BINARY: 5
} as const;

export const MONITORED_BY = {
  SERVER: 0,
  PROXY: 1,
  PROXY_GROUP: 2
} as const;

export type MonitoredBy = (typeof MONITORED_BY)[keyof typeof MONITORED_BY];

export const monitoredBySchema = numericFieldSchema.pipe(z.union([z.literal(0), z.literal(1), z.literal(2)]));

export const hostSchema = z
  .object({
    hostid: optionalId,
    host: z.string().optional(),
    name: z.string().optional(),
    status: numericFieldSchema.optional(),
    proxy_hostid: optionalId,
    proxyid: optionalId,
    proxy_groupid: optionalId,
    monitored_by: monitoredBySchema.optional()
  })
  .passthrough();

/**
 * Host payload. `proxy_hostid` is the older reference to the monitoring
 * proxy; newer servers use `proxyid` and require `monitored_by` alongside it.
 */
export type Host = z.infer<typeof hostSchema>;

/** Host template of a low-level discovery rule. */
export const hostPrototypeSchema = z
  .object({
    hostid: optionalId,
    host: z.string().optional(),
    name: z.string().optional(),
    ruleid: optionalId,
    status: numericFieldSchema.optional(),
    inventory_mode: numericFieldSchema.optional()
  })
  .passthrough();

export type HostPrototype = z.infer<typeof hostPrototypeSchema>;

export const hostGroupSchema = z
  .object({
    groupid: optionalId,
    name: z.string().optional()
  })
  .passthrough();

export type HostGroup = z.infer<typeof hostGroupSchema>;

export const userSchema = z
  .object({
    userid: optionalId,
    username: z.string().optional(),
    name: z.string().optional(),
    surname: z.string().optional(),
    roleid: optionalId,
    passwd: z.string().optional(),
    mfaid: optionalId
  })
  .passthrough();

export type User = z.infer<typeof userSchema>;

export const mediaTypeSchema = z
  .object({
    mediatypeid: optionalId,
    name: z.string().optional(),
    type: numericFieldSchema.optional(),
    status: numericFieldSchema.optional()
  })
  .passthrough();

export type MediaType = z.infer<typeof mediaTypeSchema>;

export const mfaSchema = z
  .object({
    mfaid: optionalId,
    name: z.string().optional(),
    type: numericFieldSchema.optional(),
    hash_function: numericFieldSchema.optional(),
    code_length: numericFieldSchema.optional()
  })
  .passthrough();

export type Mfa = z.infer<typeof mfaSchema>;

export const proxyGroupSchema = z
  .object({
    proxy_groupid: optionalId,
    name: z.string().optional(),
    description: z.string().optional(),
    failover_delay: z.string().optional(),
    min_online: z.string().optional()
  })
  .passthrough();

export type ProxyGroup = z.infer<typeof proxyGroupSchema>;

export const alertSchema = z
  .object({
    alertid: optionalId,
    actionid: optionalId,
    eventid: optionalId,
    clock: z.string().optional(),
    status: numericFieldSchema.optional(),
    message: z.string().optional()
  })
  .passthrough();

export type Alert = z.infer<typeof alertSchema>;

export const historyRecordSchema = z
  .object({
    itemid: optionalId,
    host: z.string().min(1).optional(),
    key: z.string().min(1).optional(),
    value: z.union([z.string(), z.number()]),
    clock: z.number().int().nonnegative().optional(),
    ns: z.number().int().nonnegative().optional()
  })
  .refine((record) => record.itemid !== undefined || (record.host !== undefined && record.key !== undefined), {
    message: 'history record needs itemid, or host and key'
  });

export type HistoryRecord = z.input<typeof historyRecordSchema>;

export const historyPushResultSchema = z
  .object({
    response: z.string(),
    data: z.array(z.object({ itemid: optionalId, error: z.string().optional() }).passthrough()).default([])
  })
  .passthrough();

export type HistoryPushResult = z.infer<typeof historyPushResultSchema>;
