import { readdirSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { SYNC_PATHS, isWithinPaths } from '../types/common.js';
import type { BackupManifest, BackupManifestEntry, BackupSnapshot } from '../types/sync.js';
import { getBackupDir } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import {
  computeFileHash,
  ensureDir,
  isDirectory,
  listFilesRecursive,
  pathExists,
  readFileContent,
  safeCopyFile,
} from './file-ops.js';

export const MANIFEST_FILE = '.backup-manifest.json';
const STAGING_SUFFIX = '.partial';

export class BackupError extends Error {
  readonly code = 'backup_error' as const;
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(message);
    this.name = 'BackupError';
    this.path = path;
  }
}

export type SnapshotResult =
  | { ok: true; snapshot: BackupSnapshot }
  | { ok: false; error: BackupError };

export interface BackupListing {
  name: string;
  backupRoot: string;
  createdAt: string;
  fileCount: number;
}

export interface BackupManagerOptions {
  now?: () => Date;
  /** 백업 가능한 경로 (기본: SYNC_PATHS) */
  allowedPaths?: readonly string[];
  copyFile?: (src: string, dest: string) => void;
}

/** ISO-8601 UTC에서 ':'만 '-'로 바꾼 디렉토리 이름 */
export function backupDirName(date: Date): string {
  return date.toISOString().replace(/:/g, '-');
}

export class BackupManager {
  readonly backupDir: string;
  private readonly now: () => Date;
  private readonly allowedPaths: readonly string[];
  private readonly copyFile: (src: string, dest: string) => void;

  constructor(
    private readonly projectRoot: string,
    options: BackupManagerOptions = {},
  ) {
    this.backupDir = getBackupDir(projectRoot);
    this.now = options.now ?? (() => new Date());
    this.allowedPaths = options.allowedPaths ?? SYNC_PATHS;
    this.copyFile = options.copyFile ?? safeCopyFile;
  }

  /**
   * paths의 현재 내용을 타임스탬프 디렉토리에 복사합니다.
   * 스테이징 디렉토리에서 해시 검증까지 끝난 뒤에만 최종 이름으로 옮기며,
   * 하나라도 실패하면 스테이징을 지우고 BackupError를 반환합니다.
   */
  snapshot(paths: readonly string[]): SnapshotResult {
    const outside = paths.find(p => !isWithinPaths(p, this.allowedPaths));
    if (outside !== undefined) {
      return { ok: false, error: new BackupError(`Refusing to back up path outside sync paths: ${outside}`, outside) };
    }

    const createdAt = this.now();
    const backupRoot = this.reserveRoot(createdAt);
    const staging = backupRoot + STAGING_SUFFIX;
    const entries = new Map<string, BackupManifestEntry>();

    try {
      ensureDir(staging);
      for (const relativePath of paths) {
        const source = join(this.projectRoot, relativePath);
        if (isDirectory(source)) {
          const base = relativePath.replace(/\/+$/, '');
          for (const file of listFilesRecursive(source)) {
            const entry = this.copyVerified(`${base}/${file}`, staging);
            entries.set(entry.path, entry);
          }
        } else if (pathExists(source)) {
          const entry = this.copyVerified(relativePath, staging);
          entries.set(entry.path, entry);
        }
        // 로컬에 없는 경로(업스트림 신규 파일)는 백업할 내용이 없음
      }

      const manifest: BackupManifest = {
        createdAt: createdAt.toISOString(),
        files: [...entries.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
      };
      writeFileSync(join(staging, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
      renameSync(staging, backupRoot);

      logger.ok(`백업 생성: ${backupRoot} (${manifest.files.length}개 파일)`);
      for (const entry of manifest.files) logger.fileAction('backup', entry.path);
      return { ok: true, snapshot: { backupRoot, manifest } };
    } catch (err) {
      rmSync(staging, { recursive: true, force: true });
      const error = err instanceof BackupError
        ? err
        : new BackupError(`Backup failed: ${err instanceof Error ? err.message : String(err)}`);
      logger.error(error.message);
      return { ok: false, error };
    }
  }

  /** 완료된 스냅샷 목록 (최신순) */
  list(): BackupListing[] {
    if (!isDirectory(this.backupDir)) return [];

    const listings: BackupListing[] = [];
    for (const entry of readdirSync(this.backupDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name.endsWith(STAGING_SUFFIX)) continue;
      const backupRoot = join(this.backupDir, entry.name);
      const manifest = readManifest(backupRoot);
      if (!manifest) continue;
      listings.push({
        name: entry.name,
        backupRoot,
        createdAt: manifest.createdAt,
        fileCount: manifest.files.length,
      });
    }
    return listings.sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
  }

  private reserveRoot(date: Date): string {
    const base = join(this.backupDir, backupDirName(date));
    let candidate = base;
    for (let n = 1; pathExists(candidate) || pathExists(candidate + STAGING_SUFFIX); n++) {
      candidate = `${base}-${n}`;
    }
    return candidate;
  }

  private copyVerified(relativePath: string, staging: string): BackupManifestEntry {
    const source = join(this.projectRoot, relativePath);
    const dest = join(staging, relativePath);
    this.copyFile(source, dest);

    const expected = computeFileHash(source);
    const actual = computeFileHash(dest);
    if (expected !== actual) {
      throw new BackupError(`Backup copy of ${relativePath} does not match the original`, relativePath);
    }
    return { path: relativePath, size: statSync(dest).size, sha256: actual };
  }
}

function readManifest(backupRoot: string): BackupManifest | null {
  const content = readFileContent(join(backupRoot, MANIFEST_FILE));
  if (content === null) return null;
  try {
    const data: unknown = JSON.parse(content);
    if (
      typeof data === 'object' && data !== null &&
      'createdAt' in data && typeof data.createdAt === 'string' &&
      'files' in data && Array.isArray(data.files)
    ) {
      return { createdAt: data.createdAt, files: data.files.filter(isManifestEntry) };
    }
    return null;
  } catch {
    return null;
  }
}

function isManifestEntry(value: unknown): value is BackupManifestEntry {
  return (
    typeof value === 'object' && value !== null &&
    'path' in value && typeof value.path === 'string' &&
    'size' in value && typeof value.size === 'number' &&
    'sha256' in value && typeof value.sha256 === 'string'
  );
}
