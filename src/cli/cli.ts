#!/usr/bin/env node
/**
 * Career Companion CLI
 * Runs the HTTP service and administers prompts in the registry
 */

import { readFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import dotenv from 'dotenv';
import { createContainer, type Deps } from '../app/container';
import { CONSTANTS, getPackageVersion } from '../config/app-config';
import { createLogger, type Logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { createApp, startServer, stopServer } from '../server/app';

const SHUTDOWN_TIMEOUT_MS = 10000;

interface GlobalOptions {
  config?: string;
  logLevel?: string;
  port?: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('must be an integer between 0 and 65535');
  }
  return port;
}

function parseVersion(value: string): number {
  const version = Number(value);
  if (!Number.isInteger(version) || version < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return version;
}

/**
 * Apply global options to the environment before configuration is read
 */
function applyGlobalOptions(options: GlobalOptions): void {
  if (options.config) {
    const loaded = dotenv.config({ path: options.config });
    if (loaded.error) {
      throw new Error(`Cannot read configuration file ${options.config}: ${loaded.error.message}`);
    }
  }
  if (options.logLevel) process.env.LOG_LEVEL = options.logLevel;
  if (options.port !== undefined) process.env.PORT = String(options.port);
}

async function withContainer(
  program: Command,
  action: (deps: Deps) => Promise<void>,
): Promise<void> {
  applyGlobalOptions(program.opts<GlobalOptions>());
  const deps = await createContainer();
  await action(deps);
}

async function serve(deps: Deps): Promise<void> {
  const { config, careerService } = deps;
  const logger = deps.logger.child({ component: 'cli' });

  const report = await careerService.preloadPrompts();
  logger.info(report, 'Prompt preload finished');

  const server = await startServer(createApp(deps), config.server.port, config.server.host);
  logger.info(
    { host: config.server.host, port: config.server.port, version: config.server.version },
    'Career Companion listening',
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown initiated');
    const forced = setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forced.unref();

    await stopServer(server);
    clearTimeout(forced);
    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown error');
        process.exit(1);
      });
    });
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('career-companion')
    .description('AI career guidance service with registry-backed prompts')
    .version(getPackageVersion())
    .option('--config <path>', 'path to a .env file to load before reading configuration')
    .addOption(
      new Option('--log-level <level>', 'logging level').choices([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ]),
    )
    .option('--port <port>', 'HTTP port (default: 8080)', parsePort);

  program
    .command('serve', { isDefault: true })
    .description('preload prompts and start the HTTP service')
    .action(() => withContainer(program, serve));

  const prompts = program.command('prompts').description('manage prompts in the registry');

  prompts
    .command('list')
    .description('list registered prompts')
    .action(() =>
      withContainer(program, async ({ careerService }) => {
        const listing = await careerService.listPrompts();
        process.stdout.write(`${JSON.stringify(listing, null, 2)}\n`);
      }),
    );

  prompts
    .command('register <name> <file>')
    .description('register the content of <file> as a new version and deploy it')
    .option('--model <model>', 'model tag recorded on the version', CONSTANTS.DEFAULTS.GEMINI_MODEL)
    .action((name: string, file: string, options: { model: string }) =>
      withContainer(program, async ({ careerService }) => {
        const content = await readFile(file, 'utf-8');
        const message = await careerService.registerPrompt(name, content, options.model);
        process.stdout.write(`${message}\n`);
      }),
    );

  prompts
    .command('promote <name> <version>')
    .description('point an alias at an existing version')
    .option('--alias <alias>', 'alias to move', CONSTANTS.DEFAULTS.PROMPT_ALIAS)
    .action((name: string, version: string, options: { alias: string }) =>
      withContainer(program, async ({ careerService }) => {
        const target = parseVersion(version);
        await careerService.promotePrompt(name, target, options.alias);
        process.stdout.write(`Alias '${options.alias}' of '${name}' now points to version ${target}\n`);
      }),
    );

  prompts
    .command('seed')
    .description('register every catalog prompt file as a new deployed version')
    .action(() =>
      withContainer(program, async ({ careerService, config }) => {
        const results = await careerService.seedPrompts(config.model.name);
        for (const result of results) {
          process.stdout.write(
            result.error
              ? `${result.name}: failed (${result.error})\n`
              : `${result.name}: version ${result.version}\n`,
          );
        }
        if (results.some((result) => result.error)) {
          process.exitCode = 1;
        }
      }),
    );

  return program;
}

async function main(logger: Logger): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Command failed');
    process.exitCode = 1;
  }
}

if (require.main === module) {
  const logger = createLogger({ name: 'cli' });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: errorMessage(reason) }, 'Unhandled rejection in CLI');
    process.exit(1);
  });

  void main(logger);
}
