import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readPackageVersion(relativePath: string): string | undefined {
  const pkgPath = new URL(relativePath, import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolved relative to this file so it works from both src/ (tsx, vitest)
 * and dist/src/ (compiled).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    for (const candidate of ['../package.json', '../../package.json']) {
      try {
        const version = readPackageVersion(candidate);
        if (version) return version;
      } catch {
        // not at this level, try the next one
      }
    }
    return '0.0.0';
  })();
