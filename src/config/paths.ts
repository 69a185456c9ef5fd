/**
 * Configurable file paths for the migration advisor
 *
 * The export directory has an env var override and is validated against
 * path traversal: only paths under allowed base directories are accepted.
 */

import { resolve, normalize, sep } from 'path';

export interface PathConfig {
  exportDir: string;
}

function allowedBaseDirs(): string[] {
  const raw = process.env.MIGRATION_ADVISOR_ALLOWED_DIRS;
  const dirs = raw
    ? raw.split(',').map(d => d.trim()).filter(d => d.length > 0)
    : [process.cwd(), '/tmp'];
  return dirs.map(d => resolve(d));
}

function isUnder(path: string, base: string): boolean {
  return path === base || path.startsWith(base.endsWith(sep) ? base : base + sep);
}

export function validatePath(rawPath: string, label: string): string {
  if (rawPath.split(/[\\/]/).includes('..')) {
    throw new Error(`${label}: path cannot contain '..' sequences`);
  }
  const absolutePath = resolve(normalize(rawPath));
  const bases = allowedBaseDirs();
  if (!bases.some(base => isUnder(absolutePath, base))) {
    throw new Error(`${label}: path must be under ${bases.join(' or ')}, got: ${absolutePath}`);
  }
  return absolutePath;
}

let cachedConfig: PathConfig | null = null;

export function getConfig(): PathConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    exportDir: validatePath(
      process.env.MIGRATION_ADVISOR_EXPORT_DIR || './exports',
      'MIGRATION_ADVISOR_EXPORT_DIR'
    ),
  };

  return cachedConfig;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cachedConfig = null;
}
