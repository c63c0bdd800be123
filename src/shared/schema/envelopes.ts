import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export const rpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.string().optional()
});

export const requestEnvelopeSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string().min(1),
  params: z.unknown(),
  auth: z.string().min(1).optional(),
  id: z.number().int().positive()
});

export const responseEnvelopeSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    result: z.unknown().optional(),
    error: rpcErrorSchema.optional(),
    id: z.number().int().nullable()
  })
  .refine((envelope) => envelope.error !== undefined || 'result' in envelope, {
    message: 'response carries neither result nor error'
  });

export type RpcErrorPayload = z.infer<typeof rpcErrorSchema>;
export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;
