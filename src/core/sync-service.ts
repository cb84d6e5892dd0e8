import type { RepoHandle } from '../types/repo.js';
import type { SyncSettings } from '../types/config.js';
import type { StartupCheck, SyncPhase, SyncResult, UpdateCheck } from '../types/sync.js';
import { loadSettings } from './config.js';
import type { SettingsOverrides } from './config.js';
import { GitRepoHandle } from './git-repo.js';
import type { GitRepoOptions } from './git-repo.js';
import { VersionStore } from './version-store.js';
import { BackupManager } from './backup-manager.js';
import type { BackupListing } from './backup-manager.js';
import { RemoteUpdateComparator } from './update-comparator.js';
import { SelectiveSyncExecutor } from './sync-executor.js';
import type { SyncOptions } from './sync-executor.js';
import type { OverwriteStrategy } from './overwrite-strategy.js';
import type { LockResult } from './sync-lock.js';
import { checkFailure, startupReport, syncFailure, syncReport, updateCheckReport } from './reporter.js';
import { formatVersion } from '../utils/version.js';
import { getProjectRoot } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

export interface EngineOptions {
  projectRoot?: string;
  /** 지정하지 않으면 git 구현 사용 */
  repo?: RepoHandle;
  settings?: SettingsOverrides;
  strategy?: OverwriteStrategy;
  now?: () => Date;
  acquireLock?: (dir: string) => LockResult;
  onPhase?: (phase: SyncPhase) => void;
}

export interface SyncEngine {
  projectRoot: string;
  settings: SyncSettings;
  repo: RepoHandle;
  versionStore: VersionStore;
  backupManager: BackupManager;
  comparator: RemoteUpdateComparator;
  executor: SelectiveSyncExecutor;
}

function buildEngine(
  projectRoot: string,
  settings: SyncSettings,
  options: EngineOptions,
  repoOptions: GitRepoOptions = {},
): SyncEngine {
  const repo = options.repo ?? new GitRepoHandle(projectRoot, { timeoutMs: settings.fetchTimeoutMs, ...repoOptions });
  const versionStore = new VersionStore(projectRoot);
  const backupManager = new BackupManager(projectRoot, { now: options.now });
  return {
    projectRoot,
    settings,
    repo,
    versionStore,
    backupManager,
    comparator: new RemoteUpdateComparator(repo, versionStore, settings),
    executor: new SelectiveSyncExecutor({
      repo,
      versionStore,
      backupManager,
      settings,
      strategy: options.strategy,
      acquireLock: options.acquireLock,
      onPhase: options.onPhase,
    }),
  };
}

export function createSyncEngine(options: EngineOptions = {}): SyncEngine {
  const projectRoot = getProjectRoot(options.projectRoot);
  return buildEngine(projectRoot, loadSettings(projectRoot, options.settings), options);
}

export function checkUpdate(options: EngineOptions = {}): UpdateCheck {
  try {
    return updateCheckReport(createSyncEngine(options).comparator.checkUpdate());
  } catch (err) {
    logger.error(`업데이트 확인 실패: ${String(err)}`);
    return checkFailure(err);
  }
}

export function sync(options: EngineOptions & SyncOptions = {}): SyncResult {
  let versionBefore: string | undefined;
  try {
    const engine = createSyncEngine(options);
    versionBefore = formatVersion(engine.versionStore.read());
    return syncReport(engine.executor.run({ dryRun: options.dryRun, force: options.force }));
  } catch (err) {
    logger.error(`동기화 실패: ${String(err)}`);
    return syncFailure(err, versionBefore);
  }
}

export interface StartupCheckOptions extends EngineOptions {
  timeoutMs?: number;
}

/**
 * 시작 경로용 업데이트 확인. 전체 확인에 마감 시각을 걸고,
 * 어떤 실패나 시간 초과도 { updateAvailable: false }로 바꿔 반환합니다.
 */
export function startupCheck(options: StartupCheckOptions = {}): StartupCheck {
  try {
    const projectRoot = getProjectRoot(options.projectRoot);
    const settings = loadSettings(projectRoot, options.settings);
    const deadline = Date.now() + (options.timeoutMs ?? settings.startupTimeoutMs);
    const engine = buildEngine(projectRoot, settings, options, { deadline });

    const check = engine.comparator.checkUpdate();
    if (Date.now() > deadline) {
      logger.warn('시작 시 업데이트 확인 시간 초과');
      return { updateAvailable: false, checked: false };
    }
    return startupReport(check);
  } catch (err) {
    logger.warn(`시작 시 업데이트 확인 실패 (무시): ${String(err)}`);
    return { updateAvailable: false, checked: false };
  }
}

export function listBackups(options: Pick<EngineOptions, 'projectRoot'> = {}): BackupListing[] {
  return new BackupManager(getProjectRoot(options.projectRoot)).list();
}
