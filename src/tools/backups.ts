import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { listBackups } from '../core/sync-service.js';
import { jsonResult, errorResult } from '../types/mcp.js';

export function registerListBackupsTool(server: McpServer): void {
  server.tool(
    'template_list_backups',
    '동기화 전에 만든 백업 스냅샷 목록을 반환합니다 (수동 복구용)',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
    },
    async ({ projectRoot }) => {
      try {
        return jsonResult({ backups: listBackups({ projectRoot }) });
      } catch (err) {
        return errorResult(`백업 목록 조회 실패: ${String(err)}`);
      }
    },
  );
}
