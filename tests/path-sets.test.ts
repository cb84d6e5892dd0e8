import { describe, it, expect } from 'vitest';
import {
  SYNC_PATHS,
  PROTECTED_PATHS,
  BACKUP_DIR,
  VERSION_FILE_PATH,
  findOverlaps,
  isProtectedPath,
  isSyncPath,
  isUnder,
} from '../src/types/common.js';

describe('path sets', () => {
  it('SYNC_PATHS와 PROTECTED_PATHS는 서로소', () => {
    expect(findOverlaps(SYNC_PATHS, PROTECTED_PATHS)).toEqual([]);
  });

  it('백업 디렉토리는 어느 집합에도 속하지 않음', () => {
    expect(isSyncPath(BACKUP_DIR)).toBe(false);
    expect(isProtectedPath(BACKUP_DIR)).toBe(false);
  });

  it('VERSION 파일은 동기화 경로 안에 있음', () => {
    expect(isSyncPath(VERSION_FILE_PATH)).toBe(true);
  });

  it('should classify sample paths', () => {
    expect(isSyncPath('00-system/skills/guide.md')).toBe(true);
    expect(isSyncPath('CLAUDE.md')).toBe(true);
    expect(isSyncPath('01-memory/user-config.yaml')).toBe(false);
    expect(isProtectedPath('01-memory/user-config.yaml')).toBe(true);
    expect(isProtectedPath('.env')).toBe(true);
    expect(isProtectedPath('.claude/settings.json')).toBe(true);
  });
});

describe('isUnder', () => {
  it('should match the entry itself and anything below it', () => {
    expect(isUnder('00-system', '00-system/')).toBe(true);
    expect(isUnder('00-system/a/b.md', '00-system/')).toBe(true);
    expect(isUnder('./CLAUDE.md', 'CLAUDE.md')).toBe(true);
  });

  it('should not match siblings sharing a prefix', () => {
    expect(isUnder('00-system-old/a.md', '00-system/')).toBe(false);
    expect(isUnder('CLAUDE.md.bak', 'CLAUDE.md')).toBe(false);
  });
});

describe('findOverlaps', () => {
  it('should report nested and equal entries', () => {
    expect(findOverlaps(['00-system/'], ['00-system/core/'])).toEqual([['00-system/', '00-system/core/']]);
    expect(findOverlaps(['.env'], ['.env'])).toEqual([['.env', '.env']]);
    expect(findOverlaps(['README.md'], ['docs/'])).toEqual([]);
  });
});
