import { readFileSync } from 'node:fs';
import { startupCheck } from '../core/sync-service.js';
import { buildUpdateNotice, outputResult, parseHookInput, resolveHookCwd } from './hook-utils.js';

async function main(): Promise<void> {
  let raw = '';
  try {
    raw = readFileSync('/dev/stdin', 'utf-8');
  } catch {
    // stdin 없이 호출된 경우 현재 디렉토리 기준으로 확인
    raw = '';
  }

  const cwd = resolveHookCwd(parseHookInput(raw), process.cwd());
  const report = startupCheck({ projectRoot: cwd });
  outputResult(buildUpdateNotice(report));
}

main().catch(() => outputResult());
