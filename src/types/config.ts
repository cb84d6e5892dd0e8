export interface SyncSettings {
  upstreamUrl: string;
  remoteName: string;
  upstreamBranch: string;
  fetchTimeoutMs: number;
  startupTimeoutMs: number;
}

export const CONFIG_FILENAME = 'template-sync.config.json';

export const UPSTREAM_URL_ENV = 'TEMPLATE_SYNC_UPSTREAM_URL';

/** 이전 방식의 사용자 설정 (frontmatter의 sync.upstream_url). 더 이상 읽지 않음 */
export const LEGACY_CONFIG_PATH = '01-memory/user-config.yaml';

export const DEFAULT_SETTINGS: SyncSettings = {
  upstreamUrl: 'https://github.com/example-org/system-template.git',
  remoteName: 'upstream',
  upstreamBranch: 'main',
  fetchTimeoutMs: 30_000,
  startupTimeoutMs: 5_000,
};
