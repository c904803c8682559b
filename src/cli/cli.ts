#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFile } from 'fs/promises';
import { loadConfig, reporterConfigFrom, type ProxyConfig } from '../config/proxy-config.js';
import { EventReporter } from '../filter/event-reporter.js';
import { processRequest } from '../filter/request-filter.js';
import { EventLog } from '../logging/event-log.js';
import { FilterLogger, formatEvent } from '../logging/filter-logger.js';
import { UpstreamClient } from '../ollama/upstream-client.js';
import { startProxyServer } from '../proxy/server.js';
import { APP_NAME, APP_VERSION } from '../version.js';

interface StartOptions {
  config?: string;
  host?: string;
  port?: string;
  upstream?: string;
}

interface FilterOptions {
  config?: string;
  model?: string;
  full?: boolean;
  printRequest?: boolean;
}

interface LogsOptions {
  config?: string;
  limit: string;
  export?: boolean;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

const program = new Command();

program
  .name('context-filter')
  .description('Trims bulky system-prompt sections for small Ollama models')
  .version(APP_VERSION);

program
  .command('start')
  .description('Start the filtering proxy in front of Ollama')
  .option('-c, --config <path>', 'Path to config.json')
  .option('-H, --host <host>', 'Interface to listen on')
  .option('-p, --port <number>', 'Port to listen on')
  .option('-u, --upstream <url>', 'Ollama base URL')
  .action(async (options: StartOptions) => {
    const loaded = await loadConfig(options.config);
    const config: ProxyConfig = {
      ...loaded,
      upstream: { ...loaded.upstream, url: options.upstream ?? loaded.upstream.url },
      proxy: {
        ...loaded.proxy,
        host: options.host ?? loaded.proxy.host,
        port: options.port !== undefined ? parsePort(options.port) : loaded.proxy.port,
      },
    };

    const upstream = new UpstreamClient({
      baseUrl: config.upstream.url,
      timeoutMs: config.upstream.timeoutMs,
    });

    const spinner = ora(`Checking Ollama at ${config.upstream.url}...`).start();
    const health = await upstream.healthCheck();
    if (health.reachable) {
      spinner.succeed(`Ollama reachable (${health.models.length} models installed)`);
    } else {
      spinner.warn(`Ollama not reachable yet: ${health.error ?? 'unknown error'}`);
    }

    const eventLog = new EventLog(config.logging.logsPath);
    const logger = new FilterLogger({ console: config.logging.console, eventLog });
    const { server, address } = await startProxyServer({ config, upstream, logger });

    console.log('\n' + chalk.bold(`🚀 ${APP_NAME} ${APP_VERSION}`));
    console.log(chalk.gray('─'.repeat(50)));
    console.log(`📡 Proxy:    ${chalk.green(`http://${address.address}:${address.port}`)}`);
    console.log(`🔗 Ollama:   ${chalk.cyan(config.upstream.url)}`);
    console.log(`✂️  Filtering: ${chalk.yellow(config.filter.models.join(', ') || '(none)')}`);
    console.log(`📝 Event log: ${chalk.gray(eventLog.getLogFile())}`);
    console.log(`\nPoint your agent at ${chalk.bold(`http://localhost:${address.port}/v1`)}`);
    console.log(chalk.gray('Press Ctrl+C to stop'));

    const shutdown = () => {
      console.log('\nShutting down proxy...');
      server.stop()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error(chalk.red('Error during shutdown:'), error instanceof Error ? error.message : String(error));
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

program
  .command('filter <file>')
  .description('Run the filter offline over a chat-completion request stored as JSON')
  .option('-c, --config <path>', 'Path to config.json')
  .option('-m, --model <id>', 'Override the request model id')
  .option('-f, --full', 'Show the full filtered prompt instead of a preview', false)
  .option('--print-request', 'Print the rewritten request as JSON', false)
  .action(async (file: string, options: FilterOptions) => {
    const config = await loadConfig(options.config);
    const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
    const input = options.model && typeof raw === 'object' && raw !== null
      ? { ...raw, model: options.model }
      : raw;

    const { request, stats } = processRequest(input, config.filter.models);
    const reporter = new EventReporter({
      ...reporterConfigFrom(config),
      showFullFilteredContent: options.full || config.logging.showFullFilteredContent,
    });

    for (const event of reporter.render(stats)) {
      console.log(formatEvent(event));
    }

    if (options.printRequest) {
      console.log(JSON.stringify(request, null, 2));
    }
  });

program
  .command('logs')
  .description('Show recent filter events from the event log')
  .option('-c, --config <path>', 'Path to config.json')
  .option('-l, --limit <number>', 'Number of entries to show', '20')
  .option('-e, --export', 'Print a JSON export bundle instead', false)
  .action(async (options: LogsOptions) => {
    const config = await loadConfig(options.config);
    const eventLog = new EventLog(config.logging.logsPath);
    const limit = Number.parseInt(options.limit, 10) || 20;

    if (options.export) {
      console.log(JSON.stringify(eventLog.exportBundle(limit), null, 2));
      return;
    }

    const entries = eventLog.readRecent(limit);
    if (entries.length === 0) {
      console.log(chalk.gray(`No events in ${eventLog.getLogFile()}`));
      return;
    }

    for (const entry of entries) {
      console.log(`${chalk.gray(entry.timestamp)} ${chalk.cyan(entry.type)} ${JSON.stringify(entry.data)}`);
    }
  });

// Run the CLI
program.parseAsync(process.argv).catch((error) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
