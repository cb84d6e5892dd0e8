export interface RemoteState {
  remote: string;
  ref: string;
  commit: string;
  fetchedAt: string;
}

export type NetworkErrorKind = 'timeout' | 'unreachable' | 'auth' | 'unknown';

/**
 * fetch 실패. 원인 분류(kind)는 RepoHandle 내부에서만 의미가 있고,
 * 상위 컴포넌트는 모두 network_unreachable로 보고합니다.
 */
export class NetworkError extends Error {
  readonly code = 'network_unreachable' as const;
  readonly remote: string;
  readonly kind: NetworkErrorKind;

  constructor(message: string, remote: string, kind: NetworkErrorKind = 'unknown') {
    super(message);
    this.name = 'NetworkError';
    this.remote = remote;
    this.kind = kind;
  }

  get isTimeout(): boolean {
    return this.kind === 'timeout';
  }

  get isAuthError(): boolean {
    return this.kind === 'auth';
  }
}

export type EnsureRemoteResult =
  | { ok: true; url: string; created: boolean }
  | { ok: false; error: string };

export type FetchResult =
  | { ok: true; state: RemoteState }
  | { ok: false; error: NetworkError };

/** git 호출이 실패하면 빈 목록 대신 오류를 반환 */
export type PathListResult =
  | { ok: true; paths: string[] }
  | { ok: false; error: string };

export type PathCheckout =
  | { path: string; status: 'updated' }
  | { path: string; status: 'absent_upstream' }
  | { path: string; status: 'failed'; error: string };

/**
 * 버전 관리 도구에 대한 유일한 접근 지점.
 * 나머지 컴포넌트는 이 인터페이스에만 의존합니다.
 */
export interface RepoHandle {
  ensureRemote(name: string, url: string): EnsureRemoteResult;
  fetch(remoteName: string, branch: string): FetchResult;
  /** ref 시점의 파일 내용, 없으면 null */
  readFileAtRef(path: string, ref: string): Buffer | null;
  /** 작업 트리와 targetRef의 내용이 다른 파일 목록 (paths 하위만) */
  diffPaths(targetRef: string, paths: readonly string[]): PathListResult;
  /**
   * paths 하위의 커밋되지 않은 사용자 수정.
   * targetRef가 주어지면 이미 그 ref와 같은 내용인 파일은 제외합니다.
   */
  statusDirty(paths: readonly string[], targetRef?: string): PathListResult;
  checkoutPaths(ref: string, paths: readonly string[]): PathCheckout[];
  /** 마지막으로 반영한 업스트림 커밋을 기록 */
  recordSync(commit: string): boolean;
  /** 잠금 파일 등 VCS 메타데이터를 두는 디렉토리 */
  metadataDir(): string;
}
