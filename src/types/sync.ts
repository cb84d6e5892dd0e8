import type { PathCheckout } from './repo.js';

export type SyncStatus =
  | 'success'
  | 'dry_run'
  | 'dirty_tree'
  | 'network_error'
  | 'partial_failure'
  | 'locked'
  | 'failed';

export type SyncErrorCode =
  | 'network_unreachable'
  | 'remote_unavailable'
  | 'version_unreadable'
  | 'version_write_failed'
  | 'dirty_tree'
  | 'backup_error'
  | 'partial_sync'
  | 'lock_held'
  | 'lock_unavailable'
  | 'vcs_error'
  | 'unexpected';

export interface SyncError {
  code: SyncErrorCode;
  message: string;
}

export interface SyncResult {
  status: SyncStatus;
  changedFiles: string[];
  backupLocation: string | null;
  versionBefore: string;
  versionAfter: string;
  upstreamRef?: string;
  forced?: boolean;
  dirtyPaths?: string[];
  checkouts?: PathCheckout[];
  error?: SyncError;
}

export interface UpdateCheck {
  updateAvailable: boolean;
  localVersion: string;
  upstreamVersion: string | null;
  changedPaths: string[];
  upstreamRef?: string;
  /** 버전은 올랐지만 추적 경로에 차이가 없음 */
  inconsistent?: boolean;
  error?: SyncErrorCode;
  message?: string;
}

export interface StartupCheck {
  updateAvailable: boolean;
  checked: boolean;
  localVersion?: string;
  upstreamVersion?: string;
}

export interface BackupManifestEntry {
  path: string;
  size: number;
  sha256: string;
}

export interface BackupManifest {
  createdAt: string;
  files: BackupManifestEntry[];
}

export interface BackupSnapshot {
  backupRoot: string;
  manifest: BackupManifest;
}

export type SyncPhase =
  | 'idle'
  | 'fetching'
  | 'guard-checking'
  | 'blocked'
  | 'backing-up'
  | 'checking-out'
  | 'finalizing'
  | 'done';
