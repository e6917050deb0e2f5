/**
 * Echo Command: runs the diagnostic chat completions stub until interrupted.
 */

import {
  LoggingConfigSchema,
  type DiagnosticsConfig,
  type LoggingConfig,
  type PartialConfig,
} from '@turnweaver/shared';
import { loadConfig } from '../config/loader.js';
import { startEchoServer } from '../diagnostics/echo-server.js';
import { createLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { VERSION } from '../version.js';
import { extractBoolFlag, extractFlag } from './utils.js';

export interface CommandContext {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface EchoArgs {
  help: boolean;
  version: boolean;
  configPath?: string;
  logLevel?: LoggingConfig['level'];
  diagnostics: NonNullable<PartialConfig['diagnostics']>;
}

interface Closable {
  close(): Promise<unknown>;
}

export interface EchoCommandDeps {
  start: (config: DiagnosticsConfig, logger: SecureLogger) => Promise<Closable>;
  /** Resolves with the signal name that should stop the server. */
  waitForSignal: () => Promise<string>;
}

function printHelp(stream: NodeJS.WritableStream): void {
  stream.write(`
Usage: turnweaver-echo [options]

Local OpenAI-compatible chat completions stub. Records every request under
the logs directory and answers with a fixed "mock response".

Options:
  -H, --host <string>      Listen address (default: 127.0.0.1)
  -p, --port <number>      Listen port (default: 10030)
  -d, --logs-dir <path>    Request log directory (default: ./mock_openai_logs)
  -c, --config <path>      Config file path (YAML)
  -l, --log-level <level>  Log level: trace|debug|info|warn|error
  -v, --version            Show version
  -h, --help               Show this help
\n`);
}

export function parseEchoArgs(argv: string[]): EchoArgs | { error: string } {
  let rest = argv;

  const helpResult = extractBoolFlag(rest, 'help', 'h');
  rest = helpResult.rest;
  const versionResult = extractBoolFlag(rest, 'version', 'v');
  rest = versionResult.rest;
  const hostResult = extractFlag(rest, 'host', 'H');
  rest = hostResult.rest;
  const portResult = extractFlag(rest, 'port', 'p');
  rest = portResult.rest;
  const logsDirResult = extractFlag(rest, 'logs-dir', 'd');
  rest = logsDirResult.rest;
  const configResult = extractFlag(rest, 'config', 'c');
  rest = configResult.rest;
  const logLevelResult = extractFlag(rest, 'log-level', 'l');
  rest = logLevelResult.rest;

  if (rest.length > 0) {
    return { error: `Unknown argument: ${rest[0] ?? ''}` };
  }

  const diagnostics: EchoArgs['diagnostics'] = {};
  if (hostResult.value) {
    diagnostics.host = hostResult.value;
  }
  if (portResult.value !== undefined) {
    const port = Number(portResult.value);
    if (!Number.isInteger(port)) {
      return { error: `Invalid port: ${portResult.value}` };
    }
    diagnostics.port = port;
  }
  if (logsDirResult.value) {
    diagnostics.logsDir = logsDirResult.value;
  }

  let logLevel: LoggingConfig['level'] | undefined;
  if (logLevelResult.value !== undefined) {
    const parsed = LoggingConfigSchema.shape.level.safeParse(logLevelResult.value);
    if (!parsed.success) {
      return { error: `Invalid log level: ${logLevelResult.value}` };
    }
    logLevel = parsed.data;
  }

  return {
    help: helpResult.value,
    version: versionResult.value,
    configPath: configResult.value,
    logLevel,
    diagnostics,
  };
}

function waitForProcessSignal(): Promise<string> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

const defaultDeps: EchoCommandDeps = {
  start: startEchoServer,
  waitForSignal: waitForProcessSignal,
};

export async function runEchoCommand(ctx: CommandContext, deps: EchoCommandDeps = defaultDeps): Promise<number> {
  const args = parseEchoArgs(ctx.argv);
  if ('error' in args) {
    ctx.stderr.write(`${args.error}\n`);
    printHelp(ctx.stderr);
    return 1;
  }
  if (args.help) {
    printHelp(ctx.stdout);
    return 0;
  }
  if (args.version) {
    ctx.stdout.write(`turnweaver-echo v${VERSION}\n`);
    return 0;
  }

  const overrides: PartialConfig = {
    diagnostics: args.diagnostics,
    ...(args.logLevel ? { logging: { level: args.logLevel } } : {}),
  };

  let server: Closable;
  try {
    const config = loadConfig({ configPath: args.configPath, overrides });
    const logger = createLogger(config.logging).child({ component: 'EchoServer' });
    server = await deps.start(config.diagnostics, logger);
  } catch (error) {
    ctx.stderr.write(`Failed to start echo server: ${toErrorMessage(error)}\n`);
    return 1;
  }

  const signal = await deps.waitForSignal();
  ctx.stdout.write(`\nReceived ${signal}, shutting down...\n`);
  try {
    await server.close();
  } catch (err) {
    ctx.stderr.write(`Error during shutdown: ${toErrorMessage(err)}\n`);
    return 1;
  }
  return 0;
}
