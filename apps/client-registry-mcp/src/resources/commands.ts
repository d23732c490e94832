import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { commandReference } from '@client-registry/logic';

export const COMMANDS_URI = 'client-registry://commands';

export function registerCommandsResource(server: McpServer): void {
  server.resource(
    'commands',
    COMMANDS_URI,
    {
      description: 'Syntax and an example of every client registry command',
      mimeType: 'text/plain',
    },
    async () => ({
      contents: [{ uri: COMMANDS_URI, text: commandReference(), mimeType: 'text/plain' }],
    }),
  );
}
