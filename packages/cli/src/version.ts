/**
 * Version information, read from the package manifest
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageManifestSchema>;

const MANIFEST_URL = new URL('../package.json', import.meta.url);

export function readPackageInfo(): PackageInfo {
  const raw: unknown = JSON.parse(fs.readFileSync(fileURLToPath(MANIFEST_URL), 'utf-8'));
  return PackageManifestSchema.parse(raw);
}

export const VERSION_INFO: PackageInfo = readPackageInfo();

/**
 * Get short version for compact display
 */
export function getShortVersion(): string {
  return VERSION_INFO.version;
}
