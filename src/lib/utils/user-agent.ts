import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Sources run from src/lib/utils and the build from dist/lib/utils, both three levels deep.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'scep-acme-bridge', version: '0.0.0-dev' };

  try {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', '..', 'package.json'), 'utf-8'));
    const pkg = typeof raw === 'object' && raw !== null ? raw : {};
    cachedPkg = {
      name: 'name' in pkg && typeof pkg.name === 'string' ? pkg.name : defaults.name,
      version: 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : defaults.version,
    };
  } catch {
    cachedPkg = defaults;
  }
  return cachedPkg;
}

/** User-Agent for outbound ACME calls, as RFC 8555 §6.1 asks clients to send one. */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} Node/${process.version.replace(/^v/, '')}`;
}
