import type { StartupCheck } from '../types/sync.js';

export interface HookInput {
  cwd?: string;
  directory?: string;
  [key: string]: unknown;
}

export interface HookOutput {
  result: 'continue';
  additionalContext?: string;
}

/**
 * stdin에서 JSON을 파싱합니다.
 */
export function parseHookInput(stdin: string): HookInput | null {
  try {
    const data: unknown = JSON.parse(stdin);
    if (typeof data !== 'object' || data === null || Array.isArray(data)) return null;
    const input: HookInput = {};
    for (const [key, value] of Object.entries(data)) input[key] = value;
    return input;
  } catch {
    return null;
  }
}

export function resolveHookCwd(input: HookInput | null, fallback: string): string {
  if (typeof input?.cwd === 'string' && input.cwd) return input.cwd;
  if (typeof input?.directory === 'string' && input.directory) return input.directory;
  return fallback;
}

/**
 * 업데이트가 있을 때만 세션에 붙일 안내 문구를 만듭니다.
 */
export function buildUpdateNotice(report: StartupCheck): string | null {
  if (!report.updateAvailable) return null;
  const from = report.localVersion ?? 'unknown';
  const to = report.upstreamVersion ?? 'unknown';
  return [
    '<session-restore>',
    '',
    '[TEMPLATE UPDATE AVAILABLE]',
    '',
    `  system: v${from} → v${to}`,
    '',
    '미리보기: template-sync sync --dry-run',
    '적용: template-sync sync',
    '',
    '</session-restore>',
  ].join('\n');
}

/**
 * 훅 결과를 stdout으로 출력합니다.
 */
export function outputResult(additionalContext?: string | null): void {
  const output: HookOutput = { result: 'continue' };
  if (additionalContext) {
    output.additionalContext = additionalContext;
  }
  process.stdout.write(JSON.stringify(output));
}
