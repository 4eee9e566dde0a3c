import { readFileSync } from 'fs';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs from both src/ and dist/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = {
    name: 'oidc-tls-transport',
    version: '0.0.0-dev',
  };

  const candidates = [
    '../../../package.json', // from src/lib/utils/ and dist/lib/utils/
    '../../package.json', // bundled layouts
  ];

  for (const rel of candidates) {
    let raw: { name?: string; version?: string };
    try {
      const resolved = require.resolve(rel, { paths: [__dirname] });
      raw = JSON.parse(readFileSync(resolved, 'utf-8')) as { name?: string; version?: string };
    } catch {
      continue;
    }
    if (raw.name !== defaults.name) continue;

    cachedPkg = {
      name: raw.name,
      version: raw.version || defaults.version,
    };
    return cachedPkg;
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build a standardized User-Agent string for outbound HTTP calls */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
