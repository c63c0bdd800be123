import { z } from 'zod';

import { outputSchema } from './common.js';

export const RESOURCE_FAMILIES = [
  'host',
  'hostprototype',
  'hostgroup',
  'item',
  'itemprototype',
  'user',
  'mediatype',
  'mfa',
  'proxygroup',
  'alert'
] as const;

export const resourceFamilySchema = z.enum(RESOURCE_FAMILIES);

export type ResourceFamily = z.infer<typeof resourceFamilySchema>;

export const clientConfigSchema = z.object({
  /** JSON-RPC endpoint, usually `http(s)://<host>/api_jsonrpc.php`. */
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(30_000),
  /** Run one call at a time on this client. */
  serialize: z.boolean().default(false),
  userAgent: z.string().min(1).optional(),
  /** Skip detection and treat the server as this version. */
  version: z.string().min(1).optional(),
  defaultOutput: outputSchema.default('extend'),
  outputOverrides: z.record(resourceFamilySchema, outputSchema).default({})
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfig = z.infer<typeof clientConfigSchema>;
