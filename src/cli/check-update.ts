import { checkUpdate } from '../core/sync-service.js';
import { emit } from './output.js';
import type { GlobalOptions } from './output.js';

export async function checkUpdateCommand(options: GlobalOptions): Promise<void> {
  const report = checkUpdate({ projectRoot: options.root });
  emit(report, options);
  // 네트워크/버전 문제는 정상 보고로 취급, 예기치 않은 실패만 비정상 종료
  if (report.error === 'unexpected') process.exitCode = 1;
}
