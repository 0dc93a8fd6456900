/**
 * Installed version lookup
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

const FALLBACK_VERSION = '0.0.0';

/**
 * Walk up from `startDir` to the package.json named `packageName` and return
 * its version (src/ in dev, dist/ when bundled).
 */
export function readPackageVersion(startDir: string, packageName: string): string {
  try {
    let dir = startDir;
    for (let i = 0; i < 5; i++) {
      const pkgPath = resolve(dir, 'package.json');
      if (existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
        if (
          typeof pkg === 'object' && pkg !== null &&
          'name' in pkg && pkg.name === packageName &&
          'version' in pkg && typeof pkg.version === 'string'
        ) {
          return pkg.version;
        }
      }
      dir = resolve(dir, '..');
    }
  } catch {
    // Unreadable or malformed package.json
  }
  return FALLBACK_VERSION;
}
