import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { emit } from '../src/cli/output.js';
import { parseTimeout } from '../src/cli/startup-check.js';
import { logger } from '../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
  logger.clear();
});

describe('emit', () => {
  it('stdout에는 JSON만 출력', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.info('업데이트 가능');
    emit({ updateAvailable: true }, {});
    expect(stdout.mock.calls.map(call => call[0])).toEqual(['{\n  "updateAvailable": true\n}\n']);
    expect(stderr).not.toHaveBeenCalled();
  });

  it('should write log lines to stderr when verbose', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.warn('업스트림 연결 실패');
    emit({}, { verbose: true });
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain('[WARN] 업스트림 연결 실패');
  });
});

describe('parseTimeout', () => {
  it('should accept positive integers', () => {
    expect(parseTimeout('2500')).toBe(2500);
  });

  it('0이나 숫자가 아니면 거부', () => {
    expect(() => parseTimeout('0')).toThrow(InvalidArgumentError);
    expect(() => parseTimeout('soon')).toThrow(InvalidArgumentError);
  });
});
