import { CLIParser } from './cli/CLIParser';
import {
  createApplication,
  shutdownApplication,
  startApplication,
} from './factory/ApplicationFactory';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  const app = createApplication(options.config);

  const shutdown = async (): Promise<void> => {
    await shutdownApplication(app);
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      console.error('Error during shutdown:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await startApplication(app);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
