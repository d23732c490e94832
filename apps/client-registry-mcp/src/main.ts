import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { firstValueFrom } from 'rxjs';
import { ConfigurationService } from '@client-registry/configuration';
import { LoggerService } from '@client-registry/logger';
import { createLogic } from '@client-registry/logic';
import { createClientRegistryServer } from './app/server';

async function main(): Promise<void> {
  // stdout carries the protocol, so every log line goes to stderr
  const bootstrapLogger = new LoggerService({ level: 'warn', destination: 2 });
  const configuration = await firstValueFrom(new ConfigurationService(bootstrapLogger).loadConfiguration());

  const logger = new LoggerService({
    level: configuration.logging?.level ?? 'info',
    destination: 2,
    base: { app: configuration.app.name, environment: configuration.app.environment },
  });

  const logic = await createLogic({ configuration, logger });
  const server = createClientRegistryServer(logic, configuration);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.child({ component: 'McpServer' }).info({ dataFile: logic.dataFilePath }, 'MCP server listening on stdio');
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
