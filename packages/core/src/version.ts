/**
 * Tessera version constants.
 *
 * Reads the version from the nearest package.json above this module at load
 * time: packages/core/package.json, from src/ and from the built dist/ alike.
 */
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

function readVersion(from: string): string {
  for (let dir = from; ; dir = dirname(dir)) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    if (dirname(dir) === dir) return '0.0.0';
  }
}

/** Full version string (e.g., "0.3.0-beta") */
export const TESSERA_VERSION: string = readVersion(dirname(fileURLToPath(import.meta.url)));

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.3.0-beta" → "0.3.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0] ?? version;
}
