import type { StartupCheck, SyncResult, SyncStatus, UpdateCheck } from '../types/sync.js';
import { UNKNOWN_VERSION } from '../utils/version.js';

const FAILURE_STATUSES: ReadonlySet<SyncStatus> = new Set([
  'dirty_tree',
  'network_error',
  'partial_failure',
  'locked',
  'failed',
]);

export function isFailureStatus(status: SyncStatus): boolean {
  return FAILURE_STATUSES.has(status);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 외부 워크플로우가 기대하는 키 순서로 정리하고 값이 없는 선택 필드는 뺍니다 */
export function syncReport(result: SyncResult): SyncResult {
  const report: SyncResult = {
    status: result.status,
    changedFiles: [...result.changedFiles],
    backupLocation: result.backupLocation,
    versionBefore: result.versionBefore,
    versionAfter: result.versionAfter,
  };
  if (result.upstreamRef !== undefined) report.upstreamRef = result.upstreamRef;
  if (result.forced) report.forced = true;
  if (result.dirtyPaths !== undefined) report.dirtyPaths = [...result.dirtyPaths];
  if (result.checkouts !== undefined) report.checkouts = result.checkouts.map(c => ({ ...c }));
  if (result.error !== undefined) report.error = { ...result.error };
  return report;
}

export function updateCheckReport(check: UpdateCheck): UpdateCheck {
  const report: UpdateCheck = {
    updateAvailable: check.updateAvailable,
    localVersion: check.localVersion,
    upstreamVersion: check.upstreamVersion,
    changedPaths: [...check.changedPaths],
  };
  if (check.upstreamRef !== undefined) report.upstreamRef = check.upstreamRef;
  if (check.inconsistent) report.inconsistent = true;
  if (check.error !== undefined) report.error = check.error;
  if (check.message !== undefined) report.message = check.message;
  return report;
}

export function startupReport(check: UpdateCheck): StartupCheck {
  if (check.error !== undefined) {
    return { updateAvailable: false, checked: false };
  }
  const report: StartupCheck = {
    updateAvailable: check.updateAvailable,
    checked: true,
    localVersion: check.localVersion,
  };
  if (check.upstreamVersion !== null) report.upstreamVersion = check.upstreamVersion;
  return report;
}

/** 동기화 영역 밖의 예기치 않은 실패(디스크 가득 참 등)를 일반 실패 상태로 변환 */
export function syncFailure(err: unknown, versionBefore: string = UNKNOWN_VERSION): SyncResult {
  return {
    status: 'failed',
    changedFiles: [],
    backupLocation: null,
    versionBefore,
    versionAfter: versionBefore,
    error: { code: 'unexpected', message: errorMessage(err) },
  };
}

export function checkFailure(err: unknown): UpdateCheck {
  return {
    updateAvailable: false,
    localVersion: UNKNOWN_VERSION,
    upstreamVersion: null,
    changedPaths: [],
    error: 'unexpected',
    message: errorMessage(err),
  };
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
