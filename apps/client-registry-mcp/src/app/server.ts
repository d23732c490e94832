import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ClientRegistryConfiguration } from '@client-registry/configuration';
import { LogicService } from '@client-registry/logic';
import { registerResources } from '../resources';
import { registerTools } from '../tools';

export const SERVER_NAME = 'client-registry-mcp';

/**
 * MCP server over a running {@link LogicService}. Resources can be switched
 * off with the `mcpResources` feature flag.
 */
export function createClientRegistryServer(
  logic: LogicService,
  configuration: ClientRegistryConfiguration,
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: configuration.app.version,
  });

  registerTools(server, logic);
  if (configuration.features?.['mcpResources'] !== false) {
    registerResources(server, logic);
  }
  return server;
}
