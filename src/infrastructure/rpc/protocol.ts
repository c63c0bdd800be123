import {
  JSONRPC_VERSION,
  requestEnvelopeSchema,
  responseEnvelopeSchema,
  type RequestEnvelope,
  type ResponseEnvelope
} from '../../shared/schema/envelopes.js';

export const RPC_METHOD = {
  API_VERSION: 'apiinfo.version',
  USER_LOGIN: 'user.login',
  USER_LOGOUT: 'user.logout'
} as const;

/** Methods the server answers without a session token. */
export const UNAUTHENTICATED_METHODS: ReadonlySet<string> = new Set([RPC_METHOD.API_VERSION, RPC_METHOD.USER_LOGIN]);

const REDACTED = '[redacted]';
const SECRET_PARAM_KEYS = new Set(['password', 'passwd', 'current_passwd']);

/** Per-caller request ids. Unique for the lifetime of the counter, never reused. */
export class CorrelationIdCounter {
  private last = 0;

  public next(): number {
    this.last += 1;
    return this.last;
  }

  public get current(): number {
    return this.last;
  }
}

export const createRequestEnvelope = (
  id: number,
  method: string,
  params: unknown,
  auth?: string
): RequestEnvelope =>
  requestEnvelopeSchema.parse({
    jsonrpc: JSONRPC_VERSION,
    method,
    params,
    ...(auth ? { auth } : {}),
    id
  });

/** Throws SyntaxError for non-JSON text and ZodError for JSON that is not a response envelope. */
export const parseResponseEnvelope = (body: string): ResponseEnvelope => responseEnvelopeSchema.parse(JSON.parse(body));

export const serializeEnvelope = (envelope: RequestEnvelope): string => JSON.stringify(envelope);

const redactValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, SECRET_PARAM_KEYS.has(key) ? REDACTED : redactValue(entry)])
    );
  }
  return value;
};

/** Serialized envelope for trace output, with passwords and the token masked. */
export const describeRequest = (envelope: RequestEnvelope): string =>
  JSON.stringify({
    ...envelope,
    params: redactValue(envelope.params),
    ...(envelope.auth ? { auth: REDACTED } : {})
  });
