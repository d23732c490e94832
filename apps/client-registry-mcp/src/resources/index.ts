import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LogicService } from '@client-registry/logic';
import { registerCommandsResource } from './commands';
import { registerClientsResource } from './clients';

export function registerResources(server: McpServer, logic: LogicService): void {
  registerCommandsResource(server);
  registerClientsResource(server, logic);
}
