import type { RepoHandle } from '../types/repo.js';
import { SYNC_PATHS, isWithinPaths } from '../types/common.js';

export type DirtyCheck =
  | { ok: true; dirty: boolean; offendingPaths: string[] }
  | { ok: false; error: string };

/**
 * 동기화 경로 안의 커밋되지 않은 수정만 검사합니다.
 * 사용자 영역의 수정은 동기화가 건드리지 않으므로 대상이 아닙니다.
 * 상태를 읽지 못하면 깨끗하다고 가정하지 않고 오류를 반환합니다.
 */
export class DirtyTreeGuard {
  constructor(
    private readonly repo: RepoHandle,
    private readonly paths: readonly string[] = SYNC_PATHS,
  ) {}

  /** targetRef: 이미 이 ref와 같은 내용인 파일은 덮어써도 잃을 것이 없으므로 제외 */
  isDirty(targetRef?: string): DirtyCheck {
    const status = this.repo.statusDirty(this.paths, targetRef);
    if (!status.ok) return { ok: false, error: status.error };

    const offending = [...new Set(status.paths)]
      .filter(p => isWithinPaths(p, this.paths))
      .sort();
    return { ok: true, dirty: offending.length > 0, offendingPaths: offending };
  }
}
