import type { RepoHandle } from '../types/repo.js';
import type { SyncSettings } from '../types/config.js';
import type { SyncPhase, SyncResult } from '../types/sync.js';
import { SYNC_PATHS, VERSION_FILE_PATH } from '../types/common.js';
import { VersionStore } from './version-store.js';
import { BackupManager } from './backup-manager.js';
import { DirtyTreeGuard } from './dirty-guard.js';
import { CheckoutOverwriteStrategy } from './overwrite-strategy.js';
import type { OverwriteStrategy } from './overwrite-strategy.js';
import { acquireSyncLock } from './sync-lock.js';
import type { LockResult, SyncLock } from './sync-lock.js';
import { compareVersions, formatVersion, isKnownVersion, parseVersion, UNKNOWN_VERSION } from '../utils/version.js';
import type { SemVer } from '../utils/version.js';
import { logger } from '../utils/logger.js';

export interface SyncOptions {
  dryRun?: boolean;
  force?: boolean;
}

export interface SyncExecutorDeps {
  repo: RepoHandle;
  versionStore: VersionStore;
  backupManager: BackupManager;
  settings: Pick<SyncSettings, 'remoteName' | 'upstreamUrl' | 'upstreamBranch'>;
  strategy?: OverwriteStrategy;
  paths?: readonly string[];
  acquireLock?: (dir: string) => LockResult;
  onPhase?: (phase: SyncPhase) => void;
}

/**
 * Idle → Fetching → GuardChecking → (Blocked | BackingUp) → CheckingOut → Finalizing → Done
 *
 * 백업이 끝나기 전에는 어떤 파일도 덮어쓰지 않고, dry-run은 GuardChecking 이후 변경 목록만 계산합니다.
 */
export class SelectiveSyncExecutor {
  private phase: SyncPhase = 'idle';
  private readonly repo: RepoHandle;
  private readonly versionStore: VersionStore;
  private readonly backupManager: BackupManager;
  private readonly settings: SyncExecutorDeps['settings'];
  private readonly strategy: OverwriteStrategy;
  private readonly paths: readonly string[];
  private readonly guard: DirtyTreeGuard;
  private readonly acquireLock: (dir: string) => LockResult;
  private readonly onPhase?: (phase: SyncPhase) => void;

  constructor(deps: SyncExecutorDeps) {
    this.repo = deps.repo;
    this.versionStore = deps.versionStore;
    this.backupManager = deps.backupManager;
    this.settings = deps.settings;
    this.strategy = deps.strategy ?? new CheckoutOverwriteStrategy();
    this.paths = deps.paths ?? SYNC_PATHS;
    this.guard = new DirtyTreeGuard(this.repo, this.paths);
    this.acquireLock = deps.acquireLock ?? ((dir: string) => acquireSyncLock(dir));
    this.onPhase = deps.onPhase;
  }

  get currentPhase(): SyncPhase {
    return this.phase;
  }

  run(options: SyncOptions = {}): SyncResult {
    const dryRun = options.dryRun === true;
    const force = options.force === true;
    this.phase = 'idle';

    const versionBefore = formatVersion(this.versionStore.read());
    const result: SyncResult = {
      status: 'success',
      changedFiles: [],
      backupLocation: null,
      versionBefore,
      versionAfter: versionBefore,
      forced: force,
    };

    // dry-run은 아무것도 쓰지 않으므로 잠금도 만들지 않음
    let lock: SyncLock | null = null;
    if (!dryRun) {
      const acquired = this.acquireLock(this.repo.metadataDir());
      if (!acquired.ok && acquired.reason === 'unavailable') {
        logger.error(`잠금을 만들 수 없습니다: ${acquired.error}`);
        return {
          ...result,
          status: 'failed',
          error: { code: 'lock_unavailable', message: acquired.error },
        };
      }
      if (!acquired.ok) {
        const holder = acquired.holder ? ` (pid ${acquired.holder.pid})` : '';
        logger.error(`다른 동기화가 실행 중입니다${holder}`);
        return {
          ...result,
          status: 'locked',
          error: { code: 'lock_held', message: `Another sync is already running${holder}` },
        };
      }
      lock = acquired.lock;
    }

    try {
      return this.execute(result, dryRun, force);
    } finally {
      lock?.release();
    }
  }

  private transition(next: SyncPhase): void {
    this.phase = next;
    logger.dim(`[sync] ${next}`);
    this.onPhase?.(next);
  }

  private versionMatches(version: SemVer): boolean {
    const current = this.versionStore.read();
    return isKnownVersion(current) && compareVersions(current, version) === 0;
  }

  private execute(result: SyncResult, dryRun: boolean, force: boolean): SyncResult {
    this.transition('fetching');
    const remote = this.repo.ensureRemote(this.settings.remoteName, this.settings.upstreamUrl);
    if (!remote.ok) {
      logger.error(`remote 준비 실패: ${remote.error}`);
      return { ...result, status: 'failed', error: { code: 'remote_unavailable', message: remote.error } };
    }

    const fetched = this.repo.fetch(this.settings.remoteName, this.settings.upstreamBranch);
    if (!fetched.ok) {
      logger.error(`업스트림 연결 실패: ${fetched.error.message}`);
      return {
        ...result,
        status: 'network_error',
        error: { code: 'network_unreachable', message: fetched.error.message },
      };
    }
    const { ref, commit } = fetched.state;
    result.upstreamRef = ref;

    this.transition('guard-checking');
    const dirty = this.guard.isDirty(ref);
    if (!dirty.ok) {
      logger.error(`작업 트리 상태 확인 실패: ${dirty.error}`);
      return { ...result, status: 'failed', error: { code: 'vcs_error', message: dirty.error } };
    }
    if (dirty.dirty) {
      result.dirtyPaths = dirty.offendingPaths;
      if (!force) {
        this.transition('blocked');
        logger.warn(`동기화 경로에 커밋되지 않은 변경 ${dirty.offendingPaths.length}개 (커밋하거나 force 사용)`);
        return {
          ...result,
          status: 'dirty_tree',
          error: {
            code: 'dirty_tree',
            message: `Uncommitted changes in sync paths: ${dirty.offendingPaths.join(', ')}`,
          },
        };
      }
      logger.warn(`force: 커밋되지 않은 변경 ${dirty.offendingPaths.length}개를 백업 후 덮어씁니다`);
    }

    const diff = this.repo.diffPaths(ref, this.paths);
    if (!diff.ok) {
      logger.error(`변경 목록 계산 실패: ${diff.error}`);
      return { ...result, status: 'failed', error: { code: 'vcs_error', message: diff.error } };
    }
    const changed = [...new Set([...diff.paths, ...dirty.offendingPaths])].sort();
    result.changedFiles = changed;

    if (dryRun) {
      this.transition('done');
      logger.info(`미리보기: ${changed.length}개 파일 변경 예정`);
      return { ...result, status: 'dry_run' };
    }

    if (changed.length === 0) {
      this.transition('done');
      logger.ok('이미 최신 상태입니다');
      return result;
    }

    this.transition('backing-up');
    const backup = this.backupManager.snapshot(changed);
    if (!backup.ok) {
      return {
        ...result,
        status: 'partial_failure',
        error: { code: 'backup_error', message: backup.error.message },
      };
    }
    result.backupLocation = backup.snapshot.backupRoot;

    this.transition('checking-out');
    const checkouts = this.strategy.apply(this.repo, ref, this.paths);
    result.checkouts = checkouts;
    const failed: string[] = [];
    for (const checkout of checkouts) {
      if (checkout.status === 'failed') {
        failed.push(checkout.path);
        logger.fileAction('fail', `${checkout.path}: ${checkout.error}`);
      } else if (checkout.status === 'absent_upstream') {
        logger.fileAction('skip', `${checkout.path} (업스트림에 없음)`);
      } else {
        logger.fileAction('update', checkout.path);
      }
    }

    if (failed.length > 0) {
      return {
        ...result,
        status: 'partial_failure',
        versionAfter: formatVersion(this.versionStore.read()),
        error: {
          code: 'partial_sync',
          message: `${failed.length} of ${checkouts.length} paths failed: ${failed.join(', ')}. Restore from ${result.backupLocation}`,
        },
      };
    }

    this.transition('finalizing');
    const upstreamRaw = this.repo.readFileAtRef(VERSION_FILE_PATH, ref);
    const upstream = upstreamRaw === null ? UNKNOWN_VERSION : parseVersion(upstreamRaw.toString('utf-8'));
    if (!isKnownVersion(upstream)) {
      logger.warn('업스트림 VERSION을 읽을 수 없어 버전 기록을 건너뜁니다');
    } else if (!this.versionMatches(upstream)) {
      // checkout으로 이미 같은 버전이면 다시 쓰지 않음. 정규화된 형식으로 덮어쓰면 업스트림과 바이트가 달라짐
      const written = this.versionStore.write(upstream);
      if (!written.ok) {
        return {
          ...result,
          status: 'partial_failure',
          versionAfter: formatVersion(this.versionStore.read()),
          error: { code: 'version_write_failed', message: written.error },
        };
      }
    }
    if (!this.repo.recordSync(commit)) {
      logger.warn(`동기화 커밋 기록 실패: ${commit}`);
    }

    this.transition('done');
    result.versionAfter = formatVersion(this.versionStore.read());
    logger.ok(`동기화 완료: v${result.versionBefore} → v${result.versionAfter}`);
    return result;
  }
}
