import { join } from 'node:path';
import { z } from 'zod';
import type { SyncSettings } from '../types/config.js';
import { CONFIG_FILENAME, DEFAULT_SETTINGS, LEGACY_CONFIG_PATH, UPSTREAM_URL_ENV } from '../types/config.js';
import { getConfigPath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import { readFileContent } from './file-ops.js';

const settingsSchema = z
  .object({
    upstreamUrl: z.string().min(1),
    remoteName: z.string().regex(/^[A-Za-z0-9._-]+$/),
    upstreamBranch: z.string().min(1),
    fetchTimeoutMs: z.number().int().positive(),
    startupTimeoutMs: z.number().int().positive(),
  })
  .partial();

export type SettingsOverrides = z.infer<typeof settingsSchema>;

export function parseSettings(raw: unknown): SettingsOverrides | null {
  const parsed = settingsSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * template-sync.config.json + 환경변수 + 호출자 override 순서로 병합합니다.
 * 설정 파일이 잘못되면 경고만 남기고 기본값을 사용합니다.
 */
export function loadSettings(
  projectRoot: string,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): SyncSettings {
  let fromFile: SettingsOverrides = {};
  const content = readFileContent(getConfigPath(projectRoot));
  if (content === null) {
    warnLegacyConfig(projectRoot);
  } else {
    let raw: unknown = null;
    try {
      raw = JSON.parse(content);
    } catch {
      logger.warn('template-sync.config.json JSON 파싱 실패, 기본값 사용');
    }
    if (raw !== null) {
      const parsed = parseSettings(raw);
      if (parsed) {
        fromFile = parsed;
      } else {
        logger.warn('template-sync.config.json 형식 오류, 기본값 사용');
      }
    }
  }

  const envUrl = env[UPSTREAM_URL_ENV];
  return mergeSettings(DEFAULT_SETTINGS, [fromFile, envUrl ? { upstreamUrl: envUrl } : {}, overrides]);
}

const LEGACY_URL_PATTERN = /^\s*upstream_url\s*:/m;

function warnLegacyConfig(projectRoot: string): void {
  const legacy = readFileContent(join(projectRoot, LEGACY_CONFIG_PATH));
  if (legacy !== null && LEGACY_URL_PATTERN.test(legacy)) {
    logger.warn(
      `${LEGACY_CONFIG_PATH}의 sync.upstream_url은 읽지 않습니다. ` +
        `${CONFIG_FILENAME}의 upstreamUrl 또는 ${UPSTREAM_URL_ENV} 환경변수로 옮기세요`,
    );
  }
}

/** undefined 값은 아래 계층을 덮어쓰지 않음 */
export function mergeSettings(base: SyncSettings, layers: SettingsOverrides[]): SyncSettings {
  const settings: SyncSettings = { ...base };
  for (const layer of layers) {
    if (layer.upstreamUrl !== undefined) settings.upstreamUrl = layer.upstreamUrl;
    if (layer.remoteName !== undefined) settings.remoteName = layer.remoteName;
    if (layer.upstreamBranch !== undefined) settings.upstreamBranch = layer.upstreamBranch;
    if (layer.fetchTimeoutMs !== undefined) settings.fetchTimeoutMs = layer.fetchTimeoutMs;
    if (layer.startupTimeoutMs !== undefined) settings.startupTimeoutMs = layer.startupTimeoutMs;
  }
  return settings;
}
