import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { startupCheck } from '../core/sync-service.js';
import { jsonResult } from '../types/mcp.js';
import { logger } from '../utils/logger.js';

export function registerStartupCheckTool(server: McpServer): void {
  server.tool(
    'template_startup_check',
    '제한 시간 안에 업데이트 여부만 확인합니다. 실패해도 오류를 반환하지 않습니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      timeoutMs: z.number().int().positive().optional().describe('제한 시간 (ms)'),
    },
    async ({ projectRoot, timeoutMs }) => {
      logger.clear();
      return jsonResult(startupCheck({ projectRoot, timeoutMs }));
    },
  );
}
