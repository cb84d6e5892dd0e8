import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getPackageRoot } from './paths.js';

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

export const UNKNOWN_VERSION = 'unknown';

export type VersionReading = SemVer | typeof UNKNOWN_VERSION;

const VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:[-+][0-9A-Za-z.+-]*)?$/;

export function getPackageVersion(): string {
  try {
    const pkgPath = join(getPackageRoot(), 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * "1.2.3", "v1.2.3", "1.2.3-beta.1" 형식을 파싱합니다.
 * pre-release/build 접미사는 정렬에 사용하지 않습니다.
 */
export function parseVersion(text: string): VersionReading {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) return UNKNOWN_VERSION;
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function isKnownVersion(version: VersionReading): version is SemVer {
  return version !== UNKNOWN_VERSION;
}

export function formatVersion(version: VersionReading): string {
  if (!isKnownVersion(version)) return UNKNOWN_VERSION;
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareVersions(a: SemVer, b: SemVer): -1 | 0 | 1 {
  const pa = [a.major, a.minor, a.patch];
  const pb = [b.major, b.minor, b.patch];
  for (let i = 0; i < 3; i++) {
    if (pa[i] > pb[i]) return 1;
    if (pa[i] < pb[i]) return -1;
  }
  return 0;
}

export function isNewerVersion(current: SemVer, latest: SemVer): boolean {
  return compareVersions(latest, current) > 0;
}
