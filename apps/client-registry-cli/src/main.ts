import { firstValueFrom } from 'rxjs';
import { ConfigurationService } from '@client-registry/configuration';
import { LoggerService } from '@client-registry/logger';
import { createLogic } from '@client-registry/logic';
import { ClientRegistryCli, DEFAULT_PROMPT } from './app/app';

const DEFAULT_LOG_FILE = 'logs/client-registry.log';

async function main(): Promise<void> {
  // stderr until the configuration says where logs go
  const bootstrapLogger = new LoggerService({ level: 'warn', destination: 2 });
  const configuration = await firstValueFrom(new ConfigurationService(bootstrapLogger).loadConfiguration());

  const logger = new LoggerService({
    level: configuration.logging?.level ?? 'info',
    destination: configuration.logging?.destination ?? DEFAULT_LOG_FILE,
    base: { app: configuration.app.name, environment: configuration.app.environment },
  });

  const logic = await createLogic({ configuration, logger });
  const cli = new ClientRegistryCli(
    logic,
    {
      input: process.stdin,
      output: process.stdout,
      prompt: process.stdin.isTTY ? DEFAULT_PROMPT : '',
    },
    logger,
  );

  await cli.run();
  logic.dispose();
}

main().catch((error) => {
  console.error('Fatal error starting client registry:', error);
  process.exit(1);
});
