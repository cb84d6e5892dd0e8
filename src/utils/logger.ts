/**
 * 메시지 수집기.
 * CLI는 stdout에 JSON을, MCP 서버는 JSON-RPC를 쓰므로 core 모듈은 직접 출력하지 않고
 * 버퍼에 모은 뒤 호출자가 flush()로 꺼내 stderr 또는 응답에 붙입니다.
 */

export type LogLevel = 'info' | 'ok' | 'warn' | 'error' | 'dim';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

class SyncLogger {
  private buffer: LogEntry[] = [];

  info(msg: string): void {
    this.buffer.push({ level: 'info', message: msg });
  }

  ok(msg: string): void {
    this.buffer.push({ level: 'ok', message: msg });
  }

  warn(msg: string): void {
    this.buffer.push({ level: 'warn', message: msg });
  }

  error(msg: string): void {
    this.buffer.push({ level: 'error', message: msg });
  }

  dim(msg: string): void {
    this.buffer.push({ level: 'dim', message: msg });
  }

  fileAction(action: 'update' | 'skip' | 'fail' | 'backup', path: string): void {
    const icons: Record<typeof action, string> = {
      update: '~',
      skip: '-',
      fail: '!',
      backup: 'B',
    };
    this.buffer.push({ level: action === 'fail' ? 'warn' : 'dim', message: `  ${icons[action]} ${path}` });
  }

  /** 버퍼를 비우고 항목을 반환 */
  flush(): LogEntry[] {
    const entries = this.buffer;
    this.buffer = [];
    return entries;
  }

  clear(): void {
    this.buffer = [];
  }
}

export function formatEntry(entry: LogEntry): string {
  return entry.level === 'dim' ? entry.message : `[${entry.level.toUpperCase()}] ${entry.message}`;
}

export const logger = new SyncLogger();
