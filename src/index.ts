#!/usr/bin/env node
import 'dotenv/config';
import { USAGE, loadConfiguration } from './config';
import { CostExplorerMcpServer } from './server';
import type { ServerConfig } from './types';
import { AccessValidator } from './utils/access-validator';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

/**
 * Starts the server and returns the process exit code. A zero result means
 * the server is connected and the process stays up on the stdio channel.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let config: ServerConfig;
  try {
    config = loadConfiguration(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (config.showHelp) {
    console.error(USAGE);
    return 0;
  }

  logger.info('Configuration loaded', {
    profile: config.profile ?? 'default',
    region: config.region,
    skipStartupValidation: config.skipStartupValidation
  });

  if (!config.skipStartupValidation) {
    const validation = await new AccessValidator(config).validate();
    if (!validation.isValid) {
      console.error('Failed to start AWS Cost Explorer MCP Server:');
      for (const message of validation.errors) {
        console.error(`  ${message}`);
      }
      return 1;
    }
  }

  const mcpServer = new CostExplorerMcpServer(config);
  await mcpServer.start();

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    mcpServer.close().then(
      () => process.exit(0),
      error => {
        logger.error('Error while closing server', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return 0;
}

if (require.main === module) {
  main().then(
    exitCode => {
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    },
    error => {
      console.error('Unexpected error starting server:', error);
      process.exit(1);
    }
  );
}
