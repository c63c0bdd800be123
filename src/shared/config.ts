import { AppError } from './errors/AppError.js';
import { ERROR_CODE } from './errors/ErrorCode.js';
import { clientConfigSchema, type ClientConfig, type ClientConfigInput } from './schema/config.js';
import type { Output } from './schema/common.js';

export const parseClientConfig = (input: ClientConfigInput): ClientConfig => {
  const parsed = clientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new AppError('Invalid client configuration.', {
      code: ERROR_CODE.VALIDATION_ERROR,
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`) },
      suggestions: ['Set ZABBIX_URL or pass { url } to the client.']
    });
  }

  return parsed.data;
};

const parseBoolean = (value: string | undefined): boolean | undefined => {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
};

const parseOutput = (value: string | undefined): Output | undefined => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (trimmed === 'extend' || trimmed === 'count') {
    return trimmed;
  }
  return trimmed
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
};

/**
 * Reads ZABBIX_URL, ZABBIX_TIMEOUT_MS, ZABBIX_SERIALIZE, ZABBIX_VERSION and
 * ZABBIX_DEFAULT_OUTPUT. Explicit overrides win over the environment.
 */
export const loadConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ClientConfigInput> = {}
): ClientConfig => {
  const timeout = nonEmpty(env.ZABBIX_TIMEOUT_MS);

  return parseClientConfig({
    url: nonEmpty(env.ZABBIX_URL) ?? '',
    timeoutMs: timeout === undefined ? undefined : Number(timeout),
    serialize: parseBoolean(env.ZABBIX_SERIALIZE),
    version: nonEmpty(env.ZABBIX_VERSION),
    defaultOutput: parseOutput(env.ZABBIX_DEFAULT_OUTPUT),
    ...overrides
  });
};
