import { sync } from '../core/sync-service.js';
import { isFailureStatus } from '../core/reporter.js';
import { emit } from './output.js';
import type { GlobalOptions } from './output.js';

interface SyncCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  force?: boolean;
}

export async function syncCommand(options: SyncCommandOptions): Promise<void> {
  const report = sync({
    projectRoot: options.root,
    dryRun: options.dryRun === true,
    force: options.force === true,
  });
  emit(report, options);
  if (isFailureStatus(report.status)) process.exitCode = 1;
}
