import { join } from 'node:path';
import { VERSION_FILE_PATH } from '../types/common.js';
import { atomicWriteFile, readFileContent } from './file-ops.js';
import { formatVersion, parseVersion, UNKNOWN_VERSION } from '../utils/version.js';
import type { SemVer, VersionReading } from '../utils/version.js';

export type VersionWriteResult = { ok: true } | { ok: false; error: string };

export class VersionStore {
  readonly path: string;

  constructor(projectRoot: string, relativePath: string = VERSION_FILE_PATH) {
    this.path = join(projectRoot, relativePath);
  }

  /** 파일이 없거나 형식이 잘못되면 'unknown' */
  read(): VersionReading {
    const content = readFileContent(this.path);
    if (content === null) return UNKNOWN_VERSION;
    return parseVersion(content);
  }

  write(version: SemVer): VersionWriteResult {
    try {
      atomicWriteFile(this.path, `${formatVersion(version)}\n`);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
