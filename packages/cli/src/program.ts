/**
 * honeyport CLI
 *
 * Command line interface for the multi-port TCP decoy. Events stream to the
 * console as they are recorded and to a daily JSONL log file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { EventCollector, loadLogFile, summarizeEvents, verifyChain } from '@honeyport/trace';
import type { LogEvent, LogSummary } from '@honeyport/trace';
import { errorMessage, isHoneyportError } from '@honeyport/protocol';
import { HoneyportServer, describeConfig, loadConfig, parseBannerFlags } from '@honeyport/server';
import type { ConfigLayer, ConfigResult, ServerStats } from '@honeyport/server';
import { HoneyportMetrics } from '@honeyport/otel';

export const VERSION = '0.1.0';

/**
 * Where command output goes; tests capture it.
 */
export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  log: message => console.log(message),
  error: message => console.error(message),
};

export interface ConfigOptions {
  config?: string;
  ports?: string;
  host?: string;
  maxConnections?: string;
  timeout?: string;
  banner?: string[];
  logDir?: string;
  fileLog?: boolean;
}

export interface ServeOptions extends ConfigOptions {
  quiet?: boolean;
}

export interface ServeDependencies {
  /** Stop notification; SIGINT and SIGTERM are used when omitted */
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * CLI flags as the highest-precedence config layer
 */
export function flagsLayer(options: ConfigOptions): { layer: ConfigLayer; errors: string[] } {
  const { banners, errors } = parseBannerFlags(options.banner ?? []);
  const layer: ConfigLayer = {
    ports: options.ports,
    host: options.host,
    maxConnections: options.maxConnections,
    connectionTimeoutMs: options.timeout,
    logDir: options.logDir,
    // --no-file-log only; the default must not mask the file or environment
    fileLog: options.fileLog === false ? false : undefined,
    banners: Object.keys(banners).length > 0 ? banners : undefined,
  };
  return { layer, errors };
}

async function resolveFromFlags(options: ConfigOptions, env: NodeJS.ProcessEnv): Promise<ConfigResult> {
  const flags = flagsLayer(options);
  const result = await loadConfig({ file: options.config, env, overrides: flags.layer });
  if (flags.errors.length === 0) return result;
  return { ...result, valid: false, errors: [...flags.errors, ...result.errors] };
}

export function formatEvent(event: LogEvent): string {
  const time = new Date(event.timestamp).toISOString().slice(11, 23);
  const severity = event.severity === 'error' ? chalk.red : event.severity === 'warn' ? chalk.yellow : chalk.gray;
  const type = chalk.blue(event.event_type.padEnd(20));

  const payloadStr = JSON.stringify(event.payload);
  const payload = payloadStr.length > 120 ? payloadStr.slice(0, 120) + '...' : payloadStr;

  return `${chalk.gray(time)} ${severity(event.severity.padEnd(5))} ${type} ${chalk.gray(payload)}`;
}

function printStats(stats: ServerStats, io: Output): void {
  io.log(chalk.blue('\nSession statistics:'));
  io.log(chalk.gray(`  Uptime: ${(stats.uptime_ms / 1000).toFixed(1)}s`));
  io.log(chalk.gray(`  Connections: ${stats.connections_total}`));
  io.log(chalk.gray(`  Closed on shutdown: ${stats.connections_closed_on_shutdown}`));
  for (const [port, count] of Object.entries(stats.by_port)) {
    io.log(chalk.gray(`  Port ${port}: ${count}`));
  }
}

function printSummary(file: string, summary: LogSummary, io: Output): void {
  io.log(chalk.blue(`Summary of ${path.basename(file)}:`));
  io.log(chalk.gray(`  Connections: ${summary.connections}`));
  io.log(chalk.gray(`  Payloads: ${summary.payloads}`));
  io.log(chalk.gray(`  Bytes received: ${summary.bytes_received}`));
  io.log(chalk.gray(`  Errors: ${summary.errors}`));
  if (summary.first_seen && summary.last_seen) {
    io.log(chalk.gray(`  Window: ${summary.first_seen} .. ${summary.last_seen}`));
  }

  if (Object.keys(summary.by_port).length > 0) {
    io.log(chalk.blue('\nBy port:'));
    for (const [port, count] of Object.entries(summary.by_port)) {
      io.log(chalk.gray(`  ${port.padEnd(6)} ${count}`));
    }
  }

  if (summary.top_peers.length > 0) {
    io.log(chalk.blue('\nTop peers:'));
    for (const peer of summary.top_peers) {
      io.log(chalk.gray(`  ${peer.remote_addr.padEnd(40)} ${peer.connections}`));
    }
  }
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Run the decoy until a stop signal. Resolves with the process exit code.
 */
export async function runServe(
  options: ServeOptions,
  io: Output = consoleOutput,
  deps: ServeDependencies = {}
): Promise<number> {
  let result: ConfigResult;
  try {
    result = await resolveFromFlags(options, deps.env ?? process.env);
  } catch (error) {
    io.error(chalk.red(errorMessage(error)));
    return 1;
  }

  if (!result.valid) {
    result.warnings.forEach(w => io.error(chalk.yellow(w)));
    result.errors.forEach(e => io.error(chalk.red(e)));
    return 1;
  }

  const { config } = result;
  const collector = new EventCollector({
    output_dir: config.logDir,
    file_output: config.fileLog,
    source: { component: 'honeyport.cli', version: VERSION },
  });
  collector.on('error', (error: unknown) => {
    io.error(chalk.red(`Failed to write event log: ${errorMessage(error)}`));
  });
  if (!options.quiet) {
    collector.on('event', (event: LogEvent) => io.log(formatEvent(event)));
  }

  const portWarnings = new Set(result.portWarnings.map(w => w.message));
  for (const warning of result.portWarnings) {
    collector.record('invalid_port', { entry: warning.entry, message: warning.message }, { severity: 'warn' });
  }
  result.warnings.filter(w => !portWarnings.has(w)).forEach(w => io.error(chalk.yellow(w)));
  collector.record('config_loaded', describeConfig(config));

  const metrics = new HoneyportMetrics();
  const server = new HoneyportServer(config, { log: collector, metrics });

  let stop = deps.signal;
  let detach = (): void => undefined;
  if (!stop) {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
      io.log(chalk.yellow(`\nReceived ${signal}, shutting down...`));
      controller.abort(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    detach = () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    };
    stop = controller.signal;
  }

  try {
    const started = await server.start();
    if (started === 0) {
      io.error(chalk.red('No listener could start.'));
      await server.stop('no listeners');
      return 1;
    }

    const ports = server.getListeners()
      .filter(l => l.getState() === 'listening')
      .map(l => l.boundPort);
    io.log(chalk.green(`honeyport listening on ${config.host} ports ${ports.join(', ')}`));
    if (config.fileLog) {
      io.log(chalk.gray(`Logging to ${config.logDir}`));
    }
    io.log(chalk.gray('Press Ctrl+C to stop'));

    server.stopOn(stop);
    const shutdown = await server.closed();

    printStats(server.getStats(), io);
    io.log(chalk.green(`Shutdown complete (${shutdown.reason}, ${shutdown.duration_ms}ms)`));
    return 0;
  } finally {
    detach();
    await collector.close();
    await metrics.shutdown();
  }
}

/**
 * Print the resolved configuration. Exit code 1 when it is unusable.
 */
export async function runConfigCheck(
  options: ConfigOptions & { json?: boolean },
  io: Output = consoleOutput,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let result: ConfigResult;
  try {
    result = await resolveFromFlags(options, env);
  } catch (error) {
    io.error(chalk.red(errorMessage(error)));
    return 1;
  }

  if (options.json) {
    io.log(JSON.stringify({
      valid: result.valid,
      config: describeConfig(result.config),
      errors: result.errors,
      warnings: result.warnings,
    }, null, 2));
    return result.valid ? 0 : 1;
  }

  for (const [key, value] of Object.entries(describeConfig(result.config))) {
    io.log(`${chalk.blue(key.padEnd(24))} ${JSON.stringify(value)}`);
  }
  result.warnings.forEach(w => io.log(chalk.yellow(`Warning: ${w}`)));
  result.errors.forEach(e => io.log(chalk.red(`Error: ${e}`)));

  if (result.valid) {
    io.log(chalk.green('\n✓ Configuration is valid'));
    return 0;
  }
  io.log(chalk.red('\n✗ Configuration is invalid'));
  return 1;
}

async function readLog(file: string, io: Output): Promise<LogEvent[] | undefined> {
  try {
    return await loadLogFile(file);
  } catch (error) {
    const message = isHoneyportError(error) ? error.message : errorMessage(error);
    io.error(chalk.red(`Cannot read ${file}: ${message}`));
    return undefined;
  }
}

export async function runLogSummary(
  file: string,
  options: { top?: string; json?: boolean },
  io: Output = consoleOutput
): Promise<number> {
  const events = await readLog(file, io);
  if (!events) return 1;

  const top = options.top === undefined ? undefined : Number.parseInt(options.top, 10);
  if (top !== undefined && (Number.isNaN(top) || top < 0)) {
    io.error(chalk.red(`--top must be a non-negative integer, got ${options.top}`));
    return 1;
  }

  const summary = summarizeEvents(events, { top });
  if (options.json) {
    io.log(JSON.stringify(summary, null, 2));
  } else {
    printSummary(file, summary, io);
  }
  return 0;
}

export async function runLogVerify(file: string, io: Output = consoleOutput): Promise<number> {
  const events = await readLog(file, io);
  if (!events) return 1;

  const { valid, errors } = verifyChain(events);
  if (valid) {
    io.log(chalk.green('✓ Log integrity verified'));
    io.log(chalk.gray(`  Events: ${events.length}`));
    io.log(chalk.gray('  Chain: intact'));
    return 0;
  }

  io.log(chalk.red('✗ Log integrity check failed'));
  for (const error of errors) {
    io.log(chalk.red(`  ${error}`));
  }
  return 1;
}

// =============================================================================
// Program
// =============================================================================

function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .option('-p, --ports <ports>', 'Comma-separated ports to listen on')
    .option('-H, --host <host>', 'Address to bind')
    .option('-m, --max-connections <n>', 'Connections handled at once across all ports')
    .option('-t, --timeout <ms>', 'Per-connection deadline in milliseconds')
    .option('-b, --banner <port=text...>', 'Response for one port; \\r \\n \\t \\xHH are decoded')
    .option('-l, --log-dir <dir>', 'Event log directory')
    .option('--no-file-log', 'Log to the console only');
}

export function createProgram(io: Output = consoleOutput): Command {
  const program = new Command();

  program
    .name('honeyport')
    .description('Multi-port TCP decoy that logs every connection attempt')
    .version(VERSION);

  // ===========================================================================
  // Serve Command
  // ===========================================================================

  addConfigOptions(program.command('serve'))
    .description('Listen on the configured ports until interrupted')
    .option('-q, --quiet', 'Do not print events to the console')
    .action(async (options: ServeOptions) => {
      process.exitCode = await runServe(options, io);
    });

  // ===========================================================================
  // Config Commands
  // ===========================================================================

  const configCmd = program
    .command('config')
    .description('Configuration commands');

  addConfigOptions(configCmd.command('check'))
    .description('Resolve and validate the configuration')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: ConfigOptions & { json?: boolean }) => {
      process.exitCode = await runConfigCheck(options, io);
    });

  // ===========================================================================
  // Log Commands
  // ===========================================================================

  const logCmd = program
    .command('log')
    .description('Event log commands');

  logCmd
    .command('summary <file>')
    .description('Summarize captured connections in a JSONL event log')
    .option('-n, --top <count>', 'Number of peers to list', '10')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: { top?: string; json?: boolean }) => {
      process.exitCode = await runLogSummary(file, options, io);
    });

  logCmd
    .command('verify <file>')
    .description('Verify the hash chain of a JSONL event log')
    .action(async (file: string) => {
      process.exitCode = await runLogVerify(file, io);
    });

  return program;
}
