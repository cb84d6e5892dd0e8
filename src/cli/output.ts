import chalk from 'chalk';
import { logger, formatEntry } from '../utils/logger.js';
import type { LogEntry } from '../utils/logger.js';
import { renderJson } from '../core/reporter.js';

export interface GlobalOptions {
  root?: string;
  verbose?: boolean;
}

const colors: Record<LogEntry['level'], (text: string) => string> = {
  info: chalk.blue,
  ok: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  dim: chalk.dim,
};

/** stdout에는 JSON 문서 하나만, 로그는 --verbose일 때 stderr로 */
export function emit(report: unknown, options: GlobalOptions): void {
  const entries = logger.flush();
  if (options.verbose) {
    for (const entry of entries) {
      process.stderr.write(colors[entry.level](formatEntry(entry)) + '\n');
    }
  }
  process.stdout.write(renderJson(report) + '\n');
}
