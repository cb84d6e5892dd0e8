import { listBackups } from '../core/sync-service.js';
import { emit } from './output.js';
import type { GlobalOptions } from './output.js';

export async function backupsCommand(options: GlobalOptions): Promise<void> {
  emit({ backups: listBackups({ projectRoot: options.root }) }, options);
}
