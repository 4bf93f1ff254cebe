#!/usr/bin/env node
import { getConfig } from './config/index.js';
import { createChildLogger } from './utils/logger.js';
import { parseCliArgs, usage, CliUsageError, VERSION, type CliCommand } from './cli/args.js';
import { Orchestrator } from './services/orchestrator.js';

const log = createChildLogger('main');

// Safety net: log unhandled rejections instead of crashing the process
process.on('unhandledRejection', (reason) => {
  log.error({ err: reason }, 'Unhandled promise rejection (process kept alive)');
});

function fail(message: string, showUsage = false): never {
  process.stderr.write(`error: ${message}\n`);
  if (showUsage) process.stderr.write(`\n${usage()}\n`);
  process.exit(1);
}

function readCommand(): CliCommand {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) fail(err.message, true);
    throw err;
  }
}

async function main(): Promise<void> {
  const command = readCommand();

  if (command.kind === 'help') {
    process.stdout.write(`${usage()}\n`);
    return;
  }
  if (command.kind === 'version') {
    process.stdout.write(`${VERSION}\n`);
    return;
  }

  const config = getConfig();
  const orchestrator = new Orchestrator({ config });
  const notify = { url: command.notifyUrl, template: command.notifyTemplate };

  if (command.runOnce) {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    process.once('SIGTERM', () => controller.abort());
    const summary = await orchestrator.runOnce(command.hosts, notify, controller.signal);
    await orchestrator.stop();
    process.exitCode = summary.status === 'inventory_unavailable' ? 1 : 0;
    return;
  }

  orchestrator.start(command.schedule, command.hosts, notify);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Received shutdown signal');
    try {
      await orchestrator.stop();
      log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
}

// Configuration errors (environment, schedule, hosts) end up here before the loop starts
main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
