import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { LogicService, formatCommandResult } from '@client-registry/logic';
import { textResult, userErrorResult } from './tool-result';

export function registerExecuteCommand(server: McpServer, logic: LogicService): void {
  server.tool(
    'execute_command',
    'Run one client registry command (add, edit, delete, list, find, filter, rank, desc, expand, clear, help) ' +
      'and return its feedback. Read client-registry://commands for the syntax of each command.',
    {
      command: z
        .string()
        .min(1)
        .describe('Command text as typed at the prompt (e.g., "find alex", "delete 2")'),
    },
    async ({ command }) => {
      const warnings: string[] = [];
      const subscription = logic.warnings$.subscribe((warning) => warnings.push(warning));
      try {
        const result = logic.execute(command);
        await logic.flush();
        const text = formatCommandResult(result, logic.getDisplayedClients());
        return textResult([text, ...warnings.map((warning) => `Warning: ${warning}`)].join('\n\n'));
      } catch (error) {
        return userErrorResult(error);
      } finally {
        subscription.unsubscribe();
      }
    },
  );
}
