import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import { renderJson } from '../core/reporter.js';
import { logger, formatEntry } from '../utils/logger.js';

export interface ToolResult {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

export function textResult(text: string, isError = false): ToolResult {
  return {
    content: [{ type: 'text' as const, text }],
    isError,
  };
}

/**
 * 보고서를 JSON 텍스트로 반환합니다. withLog면 수집된 로그를 log 필드로 붙입니다.
 * 로그 버퍼는 항상 비웁니다.
 */
export function jsonResult(report: object, isError = false, withLog = false): ToolResult {
  const entries = logger.flush();
  const body = withLog ? { ...report, log: entries.map(formatEntry) } : report;
  return textResult(renderJson(body), isError);
}

export function errorResult(message: string): ToolResult {
  return textResult(`✗ ${message}`, true);
}
