import { readFileSync } from 'fs';
import { join } from 'path';
import { logger } from './logger';

let cachedVersion: string | null = null;

export function getAppVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const packageJsonPath = join(__dirname, '../../package.json');
    const packageJsonRaw = readFileSync(packageJsonPath, 'utf-8');
    const packageJson: unknown = JSON.parse(packageJsonRaw);
    if (
      packageJson &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string' &&
      packageJson.version.trim().length > 0
    ) {
      cachedVersion = packageJson.version;
      return cachedVersion;
    }
  } catch (error) {
    logger.warn('Failed to resolve application version from package.json', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  cachedVersion = '0.0.0';
  return cachedVersion;
}

/**
 * Numeric dotted-version comparison. Non-numeric parts count as 0.
 * Returns -1, 0 or 1.
 */
export function compareVersions(left: string, right: string): number {
  const leftParts = left.split('.');
  const rightParts = right.split('.');
  const length = Math.max(leftParts.length, rightParts.length);

  for (let index = 0; index < length; index++) {
    const a = parseInt(leftParts[index] ?? '0', 10) || 0;
    const b = parseInt(rightParts[index] ?? '0', 10) || 0;
    if (a !== b) {
      return a < b ? -1 : 1;
    }
  }

  return 0;
}

export const APP_VERSION = getAppVersion();
