import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { isRecord } from '@/ipc/transport/jsonl.js';

/**
 * Get the package version.
 * Reads package.json once and caches the result.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(join(here, '../../package.json'), 'utf-8'));
    const version = isRecord(pkg) ? pkg['version'] : undefined;
    cachedVersion = typeof version === 'string' ? version : '0.0.0';
  } catch {
    // package.json is missing from some install layouts
    cachedVersion = '0.0.0';
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
