import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCheckUpdateTool } from './check-update.js';
import { registerSyncTool } from './sync.js';
import { registerStartupCheckTool } from './startup-check.js';
import { registerListBackupsTool } from './backups.js';

export function registerAllTools(server: McpServer): void {
  registerCheckUpdateTool(server);
  registerSyncTool(server);
  registerStartupCheckTool(server);
  registerListBackupsTool(server);
}
