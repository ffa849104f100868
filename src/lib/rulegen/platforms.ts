/**
 * Known target platforms
 *
 * Loaded once from data/platforms.json.
 */

import * as fs from 'node:fs';

export interface Platform {
  os: string;
  arch: string;
}

export interface PlatformTable {
  os: ReadonlySet<string>;
  arch: ReadonlySet<string>;
  platforms: readonly Platform[];
}

const PLATFORMS_FILE = new URL('../../../data/platforms.json', import.meta.url);

let cached: PlatformTable | null = null;

function asStrings(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`platforms.json: "${field}" must be an array of strings`);
  }
  return value;
}

function parseTable(raw: unknown): PlatformTable {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('platforms.json: expected an object');
  }
  const record: Record<string, unknown> = { ...raw };
  const os = new Set(asStrings(record.os, 'os'));
  const arch = new Set(asStrings(record.arch, 'arch'));

  if (!Array.isArray(record.platforms)) {
    throw new Error('platforms.json: "platforms" must be an array');
  }
  const platforms = record.platforms.map((entry: unknown): Platform => {
    const pair = asStrings(entry, 'platforms');
    if (pair.length !== 2) {
      throw new Error(`platforms.json: expected [os, arch], got ${JSON.stringify(entry)}`);
    }
    const [pOS, pArch] = pair;
    if (!os.has(pOS) || !arch.has(pArch)) {
      throw new Error(`platforms.json: unknown platform ${JSON.stringify(entry)}`);
    }
    return { os: pOS, arch: pArch };
  });

  return { os, arch, platforms };
}

/**
 * Return the platform table
 */
export function getPlatforms(): PlatformTable {
  if (cached === null) {
    cached = parseTable(JSON.parse(fs.readFileSync(PLATFORMS_FILE, 'utf-8')));
  }
  return cached;
}

export function isKnownOS(name: string): boolean {
  return getPlatforms().os.has(name);
}

export function isKnownArch(name: string): boolean {
  return getPlatforms().arch.has(name);
}

/**
 * Map key for an OS/architecture pair
 */
export function platformKey(p: Platform): string {
  return `${p.os}_${p.arch}`;
}
