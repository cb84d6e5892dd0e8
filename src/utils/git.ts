import { execFileSync } from 'node:child_process';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface GitRunOptions {
  cwd: string;
  timeoutMs?: number;
  /** epoch ms. 이 시각이 지나면 git을 실행하지 않고 timeout으로 처리 */
  deadline?: number;
}

export interface GitFailure {
  ok: false;
  message: string;
  timedOut: boolean;
  notInstalled: boolean;
}

export type GitRawResult = { ok: true; stdout: Buffer } | GitFailure;
export type GitResult = { ok: true; stdout: string } | GitFailure;

function toFailure(err: unknown): GitFailure {
  if (!(err instanceof Error)) {
    return { ok: false, message: String(err), timedOut: false, notInstalled: false };
  }
  const e: NodeJS.ErrnoException & { stderr?: Buffer | string; signal?: NodeJS.Signals | null } = err;
  if (e.code === 'ENOENT') {
    return { ok: false, message: 'Git is not installed', timedOut: false, notInstalled: true };
  }
  if (e.code === 'ETIMEDOUT' || e.signal === 'SIGTERM') {
    return { ok: false, message: 'Git command timed out', timedOut: true, notInstalled: false };
  }
  const stderr = e.stderr ? e.stderr.toString().trim() : '';
  return { ok: false, message: stderr || e.message, timedOut: false, notInstalled: false };
}

export function runGitRaw(args: string[], options: GitRunOptions): GitRawResult {
  let timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (options.deadline !== undefined) {
    const remaining = options.deadline - Date.now();
    if (remaining <= 0) {
      return { ok: false, message: 'Git command timed out', timedOut: true, notInstalled: false };
    }
    timeout = Math.min(timeout, remaining);
  }

  try {
    const stdout = execFileSync('git', args, {
      cwd: options.cwd,
      stdio: 'pipe',
      encoding: 'buffer',
      timeout,
      maxBuffer: 64 * 1024 * 1024,
      // 인증 프롬프트로 멈추지 않도록
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    return { ok: true, stdout };
  } catch (err) {
    return toFailure(err);
  }
}

export function runGit(args: string[], options: GitRunOptions): GitResult {
  const result = runGitRaw(args, options);
  if (!result.ok) return result;
  return { ok: true, stdout: result.stdout.toString('utf-8').trim() };
}

/**
 * `git status --porcelain -z` 출력에서 경로 목록을 뽑습니다.
 * rename/copy 레코드는 "XY 새경로\0원래경로\0" 형식이라 원래 경로는 건너뜁니다.
 */
export function parsePorcelainZ(output: string): string[] {
  const paths: string[] = [];
  const records = output.split('\0');
  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.length < 4) continue;
    paths.push(record.slice(3));
    const x = record[0];
    if (x === 'R' || x === 'C') i++;
  }
  return paths;
}

export function splitNullList(output: string): string[] {
  return output.split('\0').filter(entry => entry.length > 0);
}
