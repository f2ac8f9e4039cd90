import { ExportError } from '../errors.js';
import type { SourceClient } from './sourceClient.js';

/** Numeric dotted comparison; missing or non-numeric parts count as 0. */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => parseInt(part, 10) || 0);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Fail with VERSION_UNSUPPORTED unless the desktop application reports a
 * version at or above `minVersion`. Returns the reported version.
 */
export async function checkDesktopVersion(client: SourceClient, minVersion: string): Promise<string> {
  const reported = await client.desktopVersion();
  if (!reported) {
    throw new ExportError('VERSION_UNSUPPORTED', 'The Desktop API did not report its version.');
  }
  if (compareVersions(reported, minVersion) < 0) {
    throw new ExportError(
      'VERSION_UNSUPPORTED',
      `Installed desktop version ${reported} is too old, version ${minVersion} or newer is required.`,
    );
  }
  return reported;
}
