import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const FALLBACK_MANIFEST = { name: 'zabbix-api-client', version: '0.1.0' };

const manifestSchema = z.object({
  name: z.string().trim().min(1).catch(FALLBACK_MANIFEST.name),
  version: z.string().trim().min(1).catch(FALLBACK_MANIFEST.version)
});

export type ClientManifest = z.infer<typeof manifestSchema>;

/** Name and version from the package manifest two levels above this module, in src/ and dist/ alike. */
const readClientManifest = (): ClientManifest => {
  const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');
  try {
    return manifestSchema.parse(JSON.parse(readFileSync(path.join(rootDir, 'package.json'), 'utf8')));
  } catch {
    return FALLBACK_MANIFEST;
  }
};

const manifest = readClientManifest();

export const CLIENT_NAME = manifest.name;
export const CLIENT_VERSION = manifest.version;

export const DEFAULT_USER_AGENT = `${CLIENT_NAME}/${CLIENT_VERSION}`;
