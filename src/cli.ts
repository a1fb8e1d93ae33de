/**
 * Command-line front end. Every command maps onto one operation in
 * `ops.ts`; the exit status is 1 when an error was thrown or reported.
 */

import { Command, CommanderError } from 'commander';
import { configPath, loadConfig, saveLoginConfig, type CrossFsConfig } from './config.js';
import {
  createEnvironment,
  duplicate,
  history,
  info,
  list,
  makeRepository,
  move,
  remove,
  rootCopy,
  type Environment,
} from './ops.js';
import { ConsoleLogger, LOG_LEVELS, parseLogLevel, type Logger } from './logger.js';
import { errorMessage, reportOk, type OperationReport } from './types.js';

export const CLI_NAME = 'crossfs';
export const VERSION = '0.1.0';

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  /** Environment used for config lookup; defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Replaces the console logger. */
  logger?: Logger;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

type GlobalOptions = {
  logLevel?: string;
  config?: string;
};

interface MutationOptions {
  recursive?: boolean;
  message?: string;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * Resolves to the process exit status.
 */
export async function run(argv: string[], io: CliIo = processIo): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name(CLI_NAME)
    .description('Copy, move and delete files across local, object-store and repository backends')
    .version(VERSION)
    .option('--log-level <level>', `log verbosity (${LOG_LEVELS.join(', ')})`)
    .option('--config <file>', 'config file (default: $CROSSFS_CONFIG or ~/.crossfs/config.json)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  const globals = (command: Command): GlobalOptions => command.optsWithGlobals<GlobalOptions>();

  async function setup(command: Command): Promise<Environment> {
    const opts = globals(command);
    const config: CrossFsConfig = await loadConfig({ path: opts.config, env: io.env });
    const logger = io.logger ?? new ConsoleLogger(parseLogLevel(opts.logLevel, config.logLevel));
    return createEnvironment(config, { logger });
  }

  function finish(report: OperationReport): void {
    if (!reportOk(report)) exitCode = 1;
  }

  program
    .command('cp')
    .description('copy files or directories; wildcards allowed in the final segment')
    .argument('<source>')
    .argument('<target>')
    .option('-r, --recursive', 'copy directories recursively', false)
    .option('-m, --message <message>', 'commit message for repository destinations')
    .action(async (source: string, target: string, opts: MutationOptions, command: Command) => {
      const env = await setup(command);
      finish(await rootCopy(env, source, target, opts));
    });

  program
    .command('mv')
    .description('move a file or directory within one backend')
    .argument('<source>')
    .argument('<target>')
    .option('-r, --recursive', 'move directories', false)
    .option('-m, --message <message>', 'commit message for repository destinations')
    .action(async (source: string, target: string, opts: MutationOptions, command: Command) => {
      const env = await setup(command);
      finish(await move(env, source, target, opts));
    });

  program
    .command('rm')
    .description('delete files or directories')
    .argument('<paths...>')
    .option('-r, --recursive', 'delete directories', false)
    .option('-m, --message <message>', 'commit message for repository paths')
    .action(async (paths: string[], opts: MutationOptions, command: Command) => {
      const env = await setup(command);
      finish(await remove(env, paths, opts));
    });

  program
    .command('info')
    .description('show type and size of a path')
    .argument('<uri>')
    .action(async (uri: string, _opts: object, command: Command) => {
      const env = await setup(command);
      io.stdout(JSON.stringify(await info(env, uri)));
    });

  program
    .command('ls')
    .description('list a directory, or the branches of a repository')
    .argument('<uri>')
    .action(async (uri: string, _opts: object, command: Command) => {
      const env = await setup(command);
      for (const entry of await list(env, uri)) {
        io.stdout(`${entry.name}\t${entry.type}\t${entry.size}`);
      }
    });

  program
    .command('log')
    .description('show the commits of a repository branch')
    .argument('<uri>')
    .option('-n, --max-count <count>', 'number of commits to show', (v) => Number.parseInt(v, 10))
    .action(async (uri: string, opts: { maxCount?: number }, command: Command) => {
      const env = await setup(command);
      for (const entry of await history(env, uri, opts.maxCount)) {
        io.stdout(`${entry.commit} ${entry.message}`);
      }
    });

  program
    .command('make')
    .description('create a repository')
    .argument('<uri>')
    .action(async (uri: string, _opts: object, command: Command) => {
      const env = await setup(command);
      await makeRepository(env, uri);
    });

  program
    .command('duplicate')
    .description('copy a whole repository, by default into your own namespace')
    .argument('<source>')
    .argument('[dest]')
    .option('--private', 'make the copy private', false)
    .option('--public', 'make the copy public', false)
    .option('-v, --verbose', 'report progress', false)
    .action(
      async (
        source: string,
        dest: string | undefined,
        opts: { private: boolean; public: boolean; verbose: boolean },
        command: Command,
      ) => {
        const env = await setup(command);
        finish(await duplicate(env, source, dest, opts));
      },
    );

  program
    .command('login')
    .description('store identity and storage settings in the config file')
    .requiredOption('-u, --user <user>', 'user name')
    .requiredOption('-e, --email <email>', 'email address')
    .option('--host <host>', 'host name used for repository links')
    .option('--storage-root <dir>', 'directory holding repositories')
    .option('--force', 'replace a different stored user', false)
    .option('--no-overwrite', 'keep an existing stored identity')
    .action(
      async (
        opts: {
          user: string;
          email: string;
          host?: string;
          storageRoot?: string;
          force: boolean;
          overwrite: boolean;
        },
        command: Command,
      ) => {
        const path = globals(command).config ?? configPath(io.env ?? process.env);
        const saved = await saveLoginConfig(
          { user: opts.user, email: opts.email, host: opts.host, storageRoot: opts.storageRoot },
          { path, force: opts.force, noOverwrite: !opts.overwrite },
        );
        io.stdout(saved ? `Saved login for ${opts.user} to ${path}` : `Kept existing login in ${path}`);
      },
    );

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr(`error: ${errorMessage(err)}`);
    return 1;
  }
  return exitCode;
}
