import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { runGit, runGitRaw, parsePorcelainZ, splitNullList } from '../utils/git.js';
import type { GitResult, GitRawResult } from '../utils/git.js';
import { NetworkError } from '../types/repo.js';
import type {
  EnsureRemoteResult,
  FetchResult,
  NetworkErrorKind,
  PathCheckout,
  PathListResult,
  RepoHandle,
} from '../types/repo.js';
import { isWithinPaths, stripSlash } from '../types/common.js';
import { logger } from '../utils/logger.js';

const SYNCED_COMMIT_KEY = 'template-sync.syncedCommit';

export interface GitRepoOptions {
  timeoutMs?: number;
  /** 모든 git 호출에 적용되는 절대 마감 시각 (epoch ms) */
  deadline?: number;
}

export function classifyFetchError(message: string, timedOut: boolean): NetworkErrorKind {
  if (timedOut || /timed out|block timeout/i.test(message)) return 'timeout';
  if (
    /Authentication failed|could not read Username|Permission denied|Repository not found/i.test(message)
  ) {
    return 'auth';
  }
  if (
    /Could not resolve host|unable to access|Connection refused|Network is unreachable|Could not read from remote|does not appear to be a git repository/i.test(
      message,
    )
  ) {
    return 'unreachable';
  }
  return 'unknown';
}

function readWorkingFile(root: string, relativePath: string): Buffer | null {
  try {
    return readFileSync(join(root, relativePath));
  } catch {
    return null;
  }
}

function sameContent(a: Buffer | null, b: Buffer | null): boolean {
  if (a === null || b === null) return a === b;
  return a.equals(b);
}

export class GitRepoHandle implements RepoHandle {
  constructor(
    private readonly projectRoot: string,
    private readonly options: GitRepoOptions = {},
  ) {}

  private git(args: string[]): GitResult {
    return runGit(args, { cwd: this.projectRoot, ...this.options });
  }

  private gitRaw(args: string[]): GitRawResult {
    return runGitRaw(args, { cwd: this.projectRoot, ...this.options });
  }

  ensureRemote(name: string, url: string): EnsureRemoteResult {
    const existing = this.git(['remote', 'get-url', name]);
    if (existing.ok) {
      return { ok: true, url: existing.stdout, created: false };
    }
    if (existing.timedOut || existing.notInstalled) {
      return { ok: false, error: existing.message };
    }

    const added = this.git(['remote', 'add', name, url]);
    if (!added.ok) {
      return { ok: false, error: `Failed to add remote ${name}: ${added.message}` };
    }
    logger.info(`remote ${name} 추가: ${url}`);
    return { ok: true, url, created: true };
  }

  fetch(remoteName: string, branch: string): FetchResult {
    const fetched = this.git(['fetch', remoteName, '--quiet']);
    if (!fetched.ok) {
      const kind = classifyFetchError(fetched.message, fetched.timedOut);
      return {
        ok: false,
        error: new NetworkError(`Could not fetch ${remoteName}: ${fetched.message}`, remoteName, kind),
      };
    }

    const ref = `${remoteName}/${branch}`;
    const commit = this.git(['rev-parse', '--verify', `${ref}^{commit}`]);
    if (!commit.ok) {
      return {
        ok: false,
        error: new NetworkError(`Remote branch ${ref} not found`, remoteName, 'unknown'),
      };
    }

    return {
      ok: true,
      state: {
        remote: remoteName,
        ref,
        commit: commit.stdout,
        fetchedAt: new Date().toISOString(),
      },
    };
  }

  readFileAtRef(path: string, ref: string): Buffer | null {
    const result = this.gitRaw(['show', `${ref}:${path}`]);
    return result.ok ? result.stdout : null;
  }

  diffPaths(targetRef: string, paths: readonly string[]): PathListResult {
    const changed = new Set<string>();

    const tracked = this.gitRaw(['diff', '--name-only', '-z', targetRef, '--', ...paths]);
    if (!tracked.ok) {
      return { ok: false, error: `git diff failed: ${tracked.message}` };
    }
    for (const p of splitNullList(tracked.stdout.toString('utf-8'))) changed.add(p);

    // 추적되지 않은 파일도 업스트림에 같은 경로가 있으면 checkout 시 덮어써짐
    const untracked = this.gitRaw(['ls-files', '--others', '--exclude-standard', '-z', '--', ...paths]);
    if (!untracked.ok) {
      return { ok: false, error: `git ls-files failed: ${untracked.message}` };
    }
    for (const p of splitNullList(untracked.stdout.toString('utf-8'))) {
      const upstream = this.readFileAtRef(p, targetRef);
      if (upstream !== null && !sameContent(upstream, readWorkingFile(this.projectRoot, p))) {
        changed.add(p);
      }
    }

    return { ok: true, paths: [...changed].filter(p => isWithinPaths(p, paths)).sort() };
  }

  statusDirty(paths: readonly string[], targetRef?: string): PathListResult {
    const status = this.gitRaw(['status', '--porcelain', '-z', '--untracked-files=all', '--', ...paths]);
    if (!status.ok) {
      return { ok: false, error: `git status failed: ${status.message}` };
    }

    let dirty = parsePorcelainZ(status.stdout.toString('utf-8')).filter(p => isWithinPaths(p, paths));

    // 이전 동기화가 남긴 변경(마지막 반영 커밋과 같은 내용)은 사용자 수정이 아님
    const synced = this.git(['config', '--get', SYNCED_COMMIT_KEY]);
    if (!synced.ok && (synced.timedOut || synced.notInstalled)) {
      return { ok: false, error: `git config failed: ${synced.message}` };
    }
    const refs = [synced.ok ? synced.stdout : '', targetRef ?? ''].filter(ref => ref.length > 0);

    // 덮어써도 잃을 내용이 없는 파일(이미 대상 ref와 동일)도 제외
    for (const ref of refs) {
      dirty = dirty.filter(p => !sameContent(readWorkingFile(this.projectRoot, p), this.readFileAtRef(p, ref)));
    }
    return { ok: true, paths: dirty };
  }

  checkoutPaths(ref: string, paths: readonly string[]): PathCheckout[] {
    return paths.map((path): PathCheckout => {
      const spec = stripSlash(path);
      const exists = this.git(['cat-file', '-e', `${ref}:${spec}`]);
      if (!exists.ok) {
        return exists.timedOut
          ? { path, status: 'failed', error: exists.message }
          : { path, status: 'absent_upstream' };
      }

      const checkout = this.git(['checkout', '--no-overlay', ref, '--', spec]);
      if (!checkout.ok) {
        return { path, status: 'failed', error: checkout.message };
      }
      return { path, status: 'updated' };
    });
  }

  recordSync(commit: string): boolean {
    return this.git(['config', SYNCED_COMMIT_KEY, commit]).ok;
  }

  metadataDir(): string {
    const gitDir = this.git(['rev-parse', '--absolute-git-dir']);
    return gitDir.ok ? gitDir.stdout : join(this.projectRoot, '.git');
  }
}
