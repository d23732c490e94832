import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LogicService } from '@client-registry/logic';
import { toClientRecord } from '@client-registry/storage';

export const CLIENTS_URI = 'client-registry://clients';

export function registerClientsResource(server: McpServer, logic: LogicService): void {
  server.resource(
    'clients',
    CLIENTS_URI,
    {
      description: 'The displayed client list in data file record format, in display order',
      mimeType: 'application/json',
    },
    async () => {
      const clients = logic.getDisplayedClients().map(toClientRecord);
      return {
        contents: [{ uri: CLIENTS_URI, text: JSON.stringify({ clients }, null, 2), mimeType: 'application/json' }],
      };
    },
  );
}
