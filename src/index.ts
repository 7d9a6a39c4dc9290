#!/usr/bin/env node

import { ConfigurationError } from './errors.js';
import { HELP_TEXT, loadConfig, SERVER_VERSION, type ServerConfig } from './config.js';
import { DiffusionSessionFactory } from './diffusion/client.js';
import { startHttpServer } from './http.js';
import { createConsoleLogger, errorMessage, type StructuredLogger } from './logger.js';
import { createServer } from './server.js';
import { SessionManager } from './session-manager.js';
import { startStdioServer } from './stdio.js';
import { GuideLibrary } from './tools/context.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      console.error('Use --help for usage.');
      process.exit(2);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(HELP_TEXT);
    return;
  }

  const config = readConfig();
  const logger: StructuredLogger = createConsoleLogger(config.logLevel);
  const sessions = new SessionManager({
    factory: new DiffusionSessionFactory(logger),
    idleTimeoutMs: config.sessions.idleTimeoutMs,
    sweepIntervalMs: config.sessions.sweepIntervalMs,
    logger,
  });
  const deps = {
    tools: { sessions, logger, timeoutMs: config.sessions.toolTimeoutMs },
    guides: new GuideLibrary(),
  };

  logger.info('server_starting', { version: SERVER_VERSION, transport: config.transport });

  let closeTransport: () => Promise<void> = async () => {};
  let stopping = false;
  const stop = (reason: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('server_stopping', { reason });
    Promise.allSettled([closeTransport(), sessions.shutdown()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('server_stop_failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  if (config.transport === 'stdio') {
    const running = await startStdioServer(createServer(deps), logger, () => stop('stdin closed'));
    closeTransport = () => running.close();
  } else {
    const running = await startHttpServer({
      settings: config.http,
      sessions,
      logger,
      newServer: () => createServer(deps),
    });
    closeTransport = () => running.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
