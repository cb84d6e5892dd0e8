import type { RepoHandle } from '../types/repo.js';
import type { SyncSettings } from '../types/config.js';
import type { UpdateCheck } from '../types/sync.js';
import { SYNC_PATHS, VERSION_FILE_PATH } from '../types/common.js';
import { VersionStore } from './version-store.js';
import { formatVersion, isKnownVersion, isNewerVersion, parseVersion, UNKNOWN_VERSION } from '../utils/version.js';
import { logger } from '../utils/logger.js';

type RemoteSettings = Pick<SyncSettings, 'remoteName' | 'upstreamUrl' | 'upstreamBranch'>;

/**
 * 업스트림 템플릿에 더 높은 버전이 있는지 확인합니다 (읽기 전용).
 * 네트워크 실패를 포함한 모든 예상 가능한 실패는 결과의 error 필드로 보고하며 예외를 던지지 않습니다.
 */
export class RemoteUpdateComparator {
  constructor(
    private readonly repo: RepoHandle,
    private readonly versionStore: VersionStore,
    private readonly settings: RemoteSettings,
  ) {}

  checkUpdate(): UpdateCheck {
    const local = this.versionStore.read();
    const result: UpdateCheck = {
      updateAvailable: false,
      localVersion: formatVersion(local),
      upstreamVersion: null,
      changedPaths: [],
    };

    const remote = this.repo.ensureRemote(this.settings.remoteName, this.settings.upstreamUrl);
    if (!remote.ok) {
      logger.warn(`remote 준비 실패: ${remote.error}`);
      return { ...result, error: 'remote_unavailable' };
    }

    const fetched = this.repo.fetch(this.settings.remoteName, this.settings.upstreamBranch);
    if (!fetched.ok) {
      logger.warn(`업스트림 연결 실패 (${fetched.error.kind}): ${fetched.error.message}`);
      return { ...result, error: 'network_unreachable' };
    }

    const ref = fetched.state.ref;
    result.upstreamRef = ref;

    const upstreamRaw = this.repo.readFileAtRef(VERSION_FILE_PATH, ref);
    const upstream = upstreamRaw === null ? UNKNOWN_VERSION : parseVersion(upstreamRaw.toString('utf-8'));
    result.upstreamVersion = formatVersion(upstream);

    if (!isKnownVersion(local) || !isKnownVersion(upstream)) {
      logger.warn(`버전 읽기 실패 (local: ${result.localVersion}, upstream: ${result.upstreamVersion})`);
      return { ...result, error: 'version_unreadable' };
    }

    if (!isNewerVersion(local, upstream)) {
      logger.ok(`최신 상태입니다 (v${result.localVersion})`);
      return result;
    }

    const diff = this.repo.diffPaths(ref, SYNC_PATHS);
    if (!diff.ok) {
      logger.warn(`변경 경로 계산 실패: ${diff.error}`);
      return { ...result, error: 'vcs_error', message: diff.error };
    }

    result.updateAvailable = true;
    result.changedPaths = diff.paths;
    if (result.changedPaths.length === 0) {
      result.inconsistent = true;
      logger.warn(`v${result.upstreamVersion}로 버전이 올랐지만 추적 경로에 차이가 없습니다`);
    } else {
      logger.info(`업데이트 가능: v${result.localVersion} → v${result.upstreamVersion} (${result.changedPaths.length}개 파일)`);
    }
    return result;
  }
}
