import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LogicService } from '@client-registry/logic';
import { registerExecuteCommand } from './execute-command';
import { registerListClients } from './list-clients';
import { registerGetClientDetails } from './get-client-details';

export function registerTools(server: McpServer, logic: LogicService): void {
  registerExecuteCommand(server, logic);
  registerListClients(server, logic);
  registerGetClientDetails(server, logic);
}
