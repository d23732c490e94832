import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LogicService, formatClientList } from '@client-registry/logic';
import { textResult } from './tool-result';

export function registerListClients(server: McpServer, logic: LogicService): void {
  server.tool(
    'list_clients',
    'Show the displayed client list, numbered as commands index it. Does not reset a find, filter or rank.',
    async () => textResult(formatClientList(logic.getDisplayedClients())),
  );
}
