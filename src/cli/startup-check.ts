import { InvalidArgumentError } from 'commander';
import { startupCheck } from '../core/sync-service.js';
import { emit } from './output.js';
import type { GlobalOptions } from './output.js';

interface StartupCheckCommandOptions extends GlobalOptions {
  timeout?: number;
}

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('timeout은 양의 정수(ms)여야 합니다.');
  }
  return ms;
}

/** 항상 exit 0. 시작 시퀀스를 멈추지 않음 */
export async function startupCheckCommand(options: StartupCheckCommandOptions): Promise<void> {
  const report = startupCheck({ projectRoot: options.root, timeoutMs: options.timeout });
  emit(report, options);
}
