import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FakeRepoHandle, writeTree } from './fake-repo.js';
import type { FileMap } from './fake-repo.js';

export const LOCAL_FILES: FileMap = {
  '00-system/VERSION': '0.80.0\n',
  '00-system/core/loader.md': 'loader v1\n',
  '00-system/skills/guide.md': 'guide v1\n',
  'CLAUDE.md': '# Claude v1\n',
  'README.md': '# Readme v1\n',
  '01-memory/user-config.yaml': 'name: tester\n',
  '02-projects/alpha/plan.md': '# plan\n',
  '03-skills/custom/SKILL.md': 'custom skill\n',
  '04-workspace/notes.txt': 'notes\n',
  '.env': 'API_KEY=test-secret\n',
  '.claude/settings.json': '{}\n',
};

export const UPSTREAM_FILES: FileMap = {
  '00-system/VERSION': '0.82.0\n',
  '00-system/core/loader.md': 'loader v2\n',
  '00-system/skills/guide.md': 'guide v1\n',
  '00-system/skills/new-skill.md': 'new skill\n',
  'CLAUDE.md': '# Claude v2\n',
  'README.md': '# Readme v1\n',
  '01-memory/user-config.yaml': 'name: template\n',
};

/** LOCAL_FILES → UPSTREAM_FILES 사이에서 실제로 내용이 바뀌는 동기화 경로 파일 */
export const EXPECTED_CHANGES = [
  '00-system/VERSION',
  '00-system/core/loader.md',
  '00-system/skills/new-skill.md',
  'CLAUDE.md',
];

export interface TestProject {
  root: string;
  metaDir: string;
  repo: FakeRepoHandle;
  cleanup(): void;
}

export function createTestProject(
  local: FileMap = LOCAL_FILES,
  upstream: FileMap = UPSTREAM_FILES,
): TestProject {
  const root = mkdtempSync(join(tmpdir(), 'template-sync-test-'));
  const metaDir = mkdtempSync(join(tmpdir(), 'template-sync-meta-'));
  writeTree(root, local);
  const repo = new FakeRepoHandle(root, metaDir);
  repo.commitAll();
  repo.setUpstream(upstream);
  return {
    root,
    metaDir,
    repo,
    cleanup() {
      rmSync(root, { recursive: true, force: true });
      rmSync(metaDir, { recursive: true, force: true });
    },
  };
}

export const TEST_SETTINGS = {
  remoteName: 'upstream',
  upstreamUrl: 'https://example.invalid/system-template.git',
  upstreamBranch: 'main',
};

export const FIXED_NOW = new Date('2026-10-18T09:30:00.000Z');
