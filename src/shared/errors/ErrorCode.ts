export const ERROR_CODE = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  CARDINALITY_ERROR: 'CARDINALITY_ERROR',
  COUNT_MISMATCH: 'COUNT_MISMATCH',
  UNSUPPORTED_FEATURE: 'UNSUPPORTED_FEATURE',
  DECODE_ERROR: 'DECODE_ERROR',
  VERSION_UNKNOWN: 'VERSION_UNKNOWN',
  NOT_AUTHENTICATED: 'NOT_AUTHENTICATED',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

export type ErrorCode = (typeof ERROR_CODE)[keyof typeof ERROR_CODE];
