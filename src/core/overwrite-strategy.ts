import type { PathCheckout, RepoHandle } from '../types/repo.js';

/**
 * 동기화 경로를 업스트림 내용으로 바꾸는 정책.
 * 실행기의 단계 구성은 그대로 두고 병합 방식만 교체할 수 있도록 분리합니다.
 */
export interface OverwriteStrategy {
  readonly name: string;
  apply(repo: RepoHandle, ref: string, paths: readonly string[]): PathCheckout[];
}

/** 경로 단위 checkout. 로컬 수정은 버리고 업스트림 내용으로 교체 */
export class CheckoutOverwriteStrategy implements OverwriteStrategy {
  readonly name = 'checkout';

  apply(repo: RepoHandle, ref: string, paths: readonly string[]): PathCheckout[] {
    return repo.checkoutPaths(ref, paths);
  }
}
