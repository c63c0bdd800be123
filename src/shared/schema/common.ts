import { z } from 'zod';

/** Field selection understood by every `*.get` method. */
export const outputSchema = z.union([z.enum(['extend', 'count']), z.array(z.string().min(1)).min(1)]);

export type Output = z.infer<typeof outputSchema>;

export const nameValuePairSchema = z.object({
  name: z.string(),
  value: z.string()
});

export type NameValuePair = z.infer<typeof nameValuePairSchema>;

export const nameValueMapSchema = z.record(z.string(), z.string());

export type NameValueMap = z.infer<typeof nameValueMapSchema>;

/** Ids arrive as strings, but some servers and fixtures use numbers. */
export const resourceIdSchema = z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String);

/** `*.delete` and `*.create` answer `{ <key>: [...] }`; some deletes answer with an id-keyed object instead. */
export const idListSchema = z.union([
  z.array(resourceIdSchema),
  z.record(z.string(), resourceIdSchema).transform((byKey) => Object.values(byKey))
]);

/** Fields the server reports as numeric strings ("1"); callers may send plain numbers. */
export const numericFieldSchema = z.union([z.number(), z.string().regex(/^-?\d+$/)]).transform(Number);

export type Params = Record<string, unknown>;
