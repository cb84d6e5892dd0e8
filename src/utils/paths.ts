import { resolve, join, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { BACKUP_DIR } from '../types/common.js';
import { CONFIG_FILENAME } from '../types/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function getPackageRoot(): string {
  // dist/index.js, dist/hooks/*.js, src/utils/paths.ts 어디서 실행되든 package.json 위치까지 올라감
  let dir = __dirname;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return resolve(__dirname, '..');
    dir = parent;
  }
  return dir;
}

export function getProjectRoot(cwd?: string): string {
  return resolve(cwd || process.cwd());
}

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME);
}

export function getBackupDir(projectRoot: string): string {
  return join(projectRoot, BACKUP_DIR);
}
