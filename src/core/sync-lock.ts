import { closeSync, openSync, rmSync, writeSync } from 'node:fs';
import { join } from 'node:path';
import { isDirectory, readFileContent } from './file-ops.js';

export const LOCK_FILENAME = 'template-sync.lock';

export interface LockInfo {
  pid: number;
  acquiredAt: string;
}

export type LockResult =
  | { ok: true; lock: SyncLock }
  | { ok: false; reason: 'held'; holder: LockInfo | null }
  | { ok: false; reason: 'unavailable'; error: string };

export class SyncLock {
  private released = false;

  constructor(readonly path: string, readonly info: LockInfo) {}

  release(): void {
    if (this.released) return;
    this.released = true;
    rmSync(this.path, { force: true });
  }
}

export function readLockInfo(path: string): LockInfo | null {
  const content = readFileContent(path);
  if (content === null) return null;
  try {
    const data: unknown = JSON.parse(content);
    if (
      typeof data === 'object' && data !== null &&
      'pid' in data && typeof data.pid === 'number' &&
      'acquiredAt' in data && typeof data.acquiredAt === 'string'
    ) {
      return { pid: data.pid, acquiredAt: data.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: 프로세스는 있지만 신호 권한이 없음
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

function tryCreate(path: string, info: LockInfo): boolean {
  let fd: number;
  try {
    fd = openSync(path, 'wx');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') return false;
    throw err;
  }
  try {
    writeSync(fd, JSON.stringify(info));
  } finally {
    closeSync(fd);
  }
  return true;
}

/**
 * 단일 실행 보장을 위한 권고 잠금.
 * 살아있는 프로세스가 잡고 있으면 기다리지 않고 즉시 실패하며,
 * 죽은 프로세스의 잠금은 한 번 회수합니다.
 * 잠금 디렉토리는 만들지 않습니다 (없으면 unavailable).
 */
export function acquireSyncLock(
  dir: string,
  isAlive: (pid: number) => boolean = isProcessAlive,
): LockResult {
  if (!isDirectory(dir)) {
    return { ok: false, reason: 'unavailable', error: `Lock directory does not exist: ${dir}` };
  }
  const path = join(dir, LOCK_FILENAME);
  const info: LockInfo = { pid: process.pid, acquiredAt: new Date().toISOString() };

  for (let attempt = 0; attempt < 2; attempt++) {
    if (tryCreate(path, info)) {
      return { ok: true, lock: new SyncLock(path, info) };
    }
    const holder = readLockInfo(path);
    if (holder && isAlive(holder.pid)) {
      return { ok: false, reason: 'held', holder };
    }
    if (attempt === 0) rmSync(path, { force: true });
  }

  return { ok: false, reason: 'held', holder: readLockInfo(path) };
}
