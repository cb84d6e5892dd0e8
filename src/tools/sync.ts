import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { sync } from '../core/sync-service.js';
import { isFailureStatus } from '../core/reporter.js';
import { jsonResult } from '../types/mcp.js';
import { logger } from '../utils/logger.js';

export function registerSyncTool(server: McpServer): void {
  server.tool(
    'template_sync',
    '동기화 경로(00-system/, CLAUDE.md, README.md)를 업스트림 내용으로 교체합니다. 덮어쓰기 전에 백업합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      dryRun: z.boolean().optional().describe('변경될 파일 목록만 계산'),
      force: z.boolean().optional().describe('커밋되지 않은 변경이 있어도 진행'),
      verbose: z.boolean().optional().describe('진행 로그 포함'),
    },
    async ({ projectRoot, dryRun, force, verbose }) => {
      logger.clear();
      const report = sync({ projectRoot, dryRun: dryRun === true, force: force === true });
      return jsonResult(report, isFailureStatus(report.status), verbose === true);
    },
  );
}
