import {
  readFileSync,
  writeFileSync,
  mkdirSync,
  copyFileSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
} from 'node:fs';
import { dirname, join, relative, sep } from 'node:path';
import { createHash } from 'node:crypto';

export function computeHash(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function computeFileHash(filePath: string): string {
  return computeHash(readFileSync(filePath));
}

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

/**
 * 임시 파일에 쓴 뒤 rename으로 교체합니다.
 * 중간에 실패해도 대상 파일은 이전 내용 그대로 남습니다.
 */
export function atomicWriteFile(filePath: string, content: string): void {
  ensureDir(dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, filePath);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function safeCopyFile(src: string, dest: string): void {
  ensureDir(dirname(dest));
  copyFileSync(src, dest);
}

export function readFileContent(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function pathExists(path: string): boolean {
  try {
    statSync(path);
    return true;
  } catch {
    return false;
  }
}

/** root 하위 모든 파일의 상대 경로 ('/' 구분, 정렬) */
export function listFilesRecursive(root: string): string[] {
  const files: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        files.push(relative(root, full).split(sep).join('/'));
      }
    }
  };
  if (isDirectory(root)) walk(root);
  return files.sort();
}
