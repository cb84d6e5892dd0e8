import { Command } from 'commander';
import { getPackageVersion } from './utils/version.js';
import { checkUpdateCommand } from './cli/check-update.js';
import { syncCommand } from './cli/sync.js';
import { startupCheckCommand, parseTimeout } from './cli/startup-check.js';
import { backupsCommand } from './cli/backups.js';
import { emit } from './cli/output.js';
import { syncFailure } from './core/reporter.js';
import { CONFIG_FILENAME, LEGACY_CONFIG_PATH, UPSTREAM_URL_ENV } from './types/config.js';

const program = new Command();

program
  .name('template-sync')
  .description('업스트림 템플릿에서 시스템 파일만 안전하게 동기화')
  .version(getPackageVersion())
  .option('--root <dir>', '프로젝트 루트 (기본: 현재 디렉토리)')
  .option('--verbose', '진행 로그를 stderr에 출력')
  .addHelpText(
    'after',
    [
      '',
      '설정:',
      `  ${CONFIG_FILENAME} (upstreamUrl, remoteName, upstreamBranch, fetchTimeoutMs, startupTimeoutMs)`,
      `  ${UPSTREAM_URL_ENV} 환경변수가 upstreamUrl보다 우선합니다.`,
      `  ${LEGACY_CONFIG_PATH}의 sync.upstream_url은 더 이상 읽지 않습니다.`,
    ].join('\n'),
  );

program
  .command('check-update')
  .description('업스트림에 새 버전이 있는지 확인 (읽기 전용)')
  .action(async () => {
    await checkUpdateCommand(program.opts());
  });

program
  .command('sync')
  .description('동기화 경로를 업스트림 내용으로 교체 (백업 후)')
  .option('--dry-run', '변경될 파일 목록만 표시')
  .option('--force', '커밋되지 않은 변경이 있어도 진행 (백업됨)')
  .action(async (options: { dryRun?: boolean; force?: boolean }) => {
    await syncCommand({ ...program.opts(), ...options });
  });

program
  .command('startup-check')
  .description('시작 시 업데이트 확인 (실패해도 항상 정상 종료)')
  .option('--timeout <ms>', '전체 확인 제한 시간', parseTimeout)
  .action(async (options: { timeout?: number }) => {
    await startupCheckCommand({ ...program.opts(), ...options });
  });

program
  .command('backups')
  .description('동기화 전 백업 스냅샷 목록')
  .action(async () => {
    await backupsCommand(program.opts());
  });

program.parseAsync().catch((err: unknown) => {
  emit(syncFailure(err), program.opts());
  process.exitCode = 1;
});
