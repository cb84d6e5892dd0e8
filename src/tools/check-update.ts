import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { checkUpdate } from '../core/sync-service.js';
import { jsonResult } from '../types/mcp.js';
import { logger } from '../utils/logger.js';

export function registerCheckUpdateTool(server: McpServer): void {
  server.tool(
    'template_check_update',
    '업스트림 템플릿에 새 버전이 있는지 확인합니다 (읽기 전용)',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      verbose: z.boolean().optional().describe('진행 로그 포함'),
    },
    async ({ projectRoot, verbose }) => {
      logger.clear();
      const report = checkUpdate({ projectRoot });
      return jsonResult(report, report.error === 'unexpected', verbose === true);
    },
  );
}
