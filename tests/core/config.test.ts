import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadSettings, mergeSettings, parseSettings } from '../../src/core/config.js';
import { DEFAULT_SETTINGS } from '../../src/types/config.js';
import { logger } from '../../src/utils/logger.js';

let projectRoot: string;

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'template-sync-config-'));
  logger.clear();
});

afterEach(() => {
  rmSync(projectRoot, { recursive: true, force: true });
});

describe('loadSettings', () => {
  it('설정 파일이 없으면 기본값', () => {
    expect(loadSettings(projectRoot, {}, {})).toEqual(DEFAULT_SETTINGS);
  });

  it('should layer file, environment and overrides', () => {
    writeFileSync(
      join(projectRoot, 'template-sync.config.json'),
      JSON.stringify({ upstreamUrl: 'https://example.invalid/file.git', upstreamBranch: 'stable', fetchTimeoutMs: 1000 }),
    );
    const settings = loadSettings(
      projectRoot,
      { fetchTimeoutMs: 2000, remoteName: undefined },
      { TEMPLATE_SYNC_UPSTREAM_URL: 'https://example.invalid/env.git' },
    );
    expect(settings).toEqual({
      ...DEFAULT_SETTINGS,
      upstreamUrl: 'https://example.invalid/env.git',
      upstreamBranch: 'stable',
      fetchTimeoutMs: 2000,
    });
  });

  it('잘못된 JSON은 경고 후 기본값', () => {
    writeFileSync(join(projectRoot, 'template-sync.config.json'), '{ not json');
    expect(loadSettings(projectRoot, {}, {})).toEqual(DEFAULT_SETTINGS);
    expect(logger.flush().map(e => e.level)).toEqual(['warn']);
  });

  it('예전 yaml 설정의 upstream_url은 읽지 않고 경고', () => {
    mkdirSync(join(projectRoot, '01-memory'));
    writeFileSync(
      join(projectRoot, '01-memory', 'user-config.yaml'),
      '---\nsync:\n  upstream_url: https://example.invalid/old.git\n---\n',
    );
    expect(loadSettings(projectRoot, {}, {})).toEqual(DEFAULT_SETTINGS);
    expect(logger.flush()).toEqual([
      {
        level: 'warn',
        message:
          '01-memory/user-config.yaml의 sync.upstream_url은 읽지 않습니다. ' +
          'template-sync.config.json의 upstreamUrl 또는 TEMPLATE_SYNC_UPSTREAM_URL 환경변수로 옮기세요',
      },
    ]);
  });

  it('should stay quiet when the legacy yaml has no upstream_url', () => {
    mkdirSync(join(projectRoot, '01-memory'));
    writeFileSync(join(projectRoot, '01-memory', 'user-config.yaml'), '---\nname: 홍길동\n---\n');
    expect(loadSettings(projectRoot, {}, {})).toEqual(DEFAULT_SETTINGS);
    expect(logger.flush()).toEqual([]);
  });

  it('should ignore a file that fails validation', () => {
    writeFileSync(join(projectRoot, 'template-sync.config.json'), JSON.stringify({ remoteName: 'bad name; rm -rf' }));
    expect(loadSettings(projectRoot, {}, {}).remoteName).toBe(DEFAULT_SETTINGS.remoteName);
  });
});

describe('parseSettings', () => {
  it('should reject non-positive timeouts', () => {
    expect(parseSettings({ startupTimeoutMs: 0 })).toBeNull();
    expect(parseSettings({ startupTimeoutMs: 2500 })).toEqual({ startupTimeoutMs: 2500 });
  });
});

describe('mergeSettings', () => {
  it('뒤 계층이 우선, undefined는 무시', () => {
    expect(
      mergeSettings(DEFAULT_SETTINGS, [{ upstreamBranch: 'a' }, { upstreamBranch: 'b' }, { upstreamBranch: undefined }])
        .upstreamBranch,
    ).toBe('b');
  });
});
