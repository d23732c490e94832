import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { LogicService, formatClientDetails } from '@client-registry/logic';
import { textResult, userErrorResult } from './tool-result';

export function registerGetClientDetails(server: McpServer, logic: LogicService): void {
  server.tool(
    'get_client_details',
    'Get every field of one client, identified by its number in the displayed client list.',
    {
      index: z.number().int().describe('1-based index in the displayed client list'),
    },
    async ({ index }) => {
      try {
        const { expandedClient } = logic.execute(`expand ${index}`);
        if (!expandedClient) {
          throw new Error(`No client was expanded for index ${index}`);
        }
        return textResult(formatClientDetails(expandedClient));
      } catch (error) {
        return userErrorResult(error);
      }
    },
  );
}
