/** 업스트림 템플릿에서 덮어쓰는 경로 (시스템 소유) */
export const SYNC_PATHS = [
  '00-system/',
  'CLAUDE.md',
  'README.md',
] as const;

/** 어떤 경우에도 동기화가 건드리지 않는 경로 (사용자 소유) */
export const PROTECTED_PATHS = [
  '01-memory/',
  '02-projects/',
  '03-skills/',
  '04-workspace/',
  '.env',
  '.claude/',
  'template-sync.config.json',
] as const;

export const SYSTEM_DIR = '00-system';
export const VERSION_FILE_PATH = `${SYSTEM_DIR}/VERSION`;
export const BACKUP_DIR = '.sync-backup';

export function stripSlash(entry: string): string {
  return entry.endsWith('/') ? entry.slice(0, -1) : entry;
}

/**
 * relativePath가 entry와 같거나 그 아래에 있는지 검사합니다.
 * 'dir/' 형태의 entry는 디렉토리, 그 외는 파일 또는 디렉토리로 취급합니다.
 */
export function isUnder(relativePath: string, entry: string): boolean {
  const normalized = relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
  const base = stripSlash(entry);
  return normalized === base || normalized.startsWith(base + '/');
}

export function isWithinPaths(relativePath: string, entries: readonly string[]): boolean {
  return entries.some(entry => isUnder(relativePath, entry));
}

export function isSyncPath(relativePath: string): boolean {
  return isWithinPaths(relativePath, SYNC_PATHS);
}

export function isProtectedPath(relativePath: string): boolean {
  return isWithinPaths(relativePath, PROTECTED_PATHS);
}

/** 두 경로 집합이 서로 겹치는 항목 쌍을 반환합니다 (같음, 포함, 상위 모두 겹침) */
export function findOverlaps(
  a: readonly string[],
  b: readonly string[],
): Array<[string, string]> {
  const overlaps: Array<[string, string]> = [];
  for (const left of a) {
    for (const right of b) {
      if (isUnder(stripSlash(left), right) || isUnder(stripSlash(right), left)) {
        overlaps.push([left, right]);
      }
    }
  }
  return overlaps;
}
