/**
 * @kqlrun/cli program definition
 *
 * Commands:
 *   kqlrun run -f <folder> -w <workspace-id>   Run the folder's queries
 *   kqlrun validate -f <folder>                Check configuration, list files
 */

import { Command, InvalidArgumentError } from 'commander';
import { parseLogLevel, type LogLevel } from '@kqlrun/core';
import {
  parseColorMode,
  parseConcurrency,
  parseLogFormat,
  type ColorMode,
  type LogFormat,
  type RunSettings,
} from '@kqlrun/config';
import type { OutputStream, QueryBackend } from '@kqlrun/executor';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';

/**
 * Process surroundings of the program, replaced in tests
 */
export interface ProgramIO {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout: OutputStream;
  stderr: OutputStream;
  createBackend(): QueryBackend;
  setExitCode(code: number): void;
}

interface CommonFlags {
  folder: string;
  config?: string;
  schema?: string;
}

interface RunFlags extends CommonFlags {
  workspaceId: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  outputBase?: string;
  concurrency?: number;
  timespan?: string;
  color?: ColorMode;
  failOnError?: boolean;
}

function argParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

function parseLevelArg(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError('Expected DEBUG, INFO, WARNING, ERROR or CRITICAL.');
  }
  return level;
}

function toSettings(flags: RunFlags): Partial<RunSettings> {
  return {
    logLevel: flags.logLevel,
    logFormat: flags.logFormat,
    outputBase: flags.outputBase,
    concurrency: flags.concurrency,
    timespan: flags.timespan,
    color: flags.color,
    onQueryError: flags.failOnError ? 'fail' : undefined,
  };
}

/**
 * Build the program. Pass a preconfigured `program` to change exit and
 * output handling; subcommands inherit its settings.
 */
export function createProgram(io: ProgramIO, program: Command = new Command()): Command {
  program
    .name('kqlrun')
    .description('Run folders of KQL queries and deliver their results')
    .version('0.1.0');

  program
    .command('run')
    .description('Run every selected query file in a folder')
    .requiredOption('-f, --folder <path>', 'Folder containing .kql files')
    .requiredOption('-w, --workspace-id <id>', 'Log Analytics workspace ID')
    .option('-c, --config <path>', 'Configuration document (default: discovered)')
    .option('-s, --schema <path>', 'JSON Schema for the configuration document')
    .option('-l, --log-level <level>', 'DEBUG, INFO, WARNING, ERROR or CRITICAL', parseLevelArg)
    .option('--log-format <format>', 'json or pretty', argParser(value => parseLogFormat(value)))
    .option('-o, --output-base <dir>', 'Base directory for relative output paths')
    .option('--concurrency <n>', 'Query files run at once', argParser(value => parseConcurrency(value)))
    .option('--timespan <duration>', 'ISO 8601 duration, e.g. P1D')
    .option('--color <mode>', 'auto, always or never', argParser(value => parseColorMode(value)))
    .option('--fail-on-error', 'Exit with 1 when any query or output fails')
    .action(async (flags: RunFlags) => {
      const result = await runCommand({
        folder: flags.folder,
        workspaceId: flags.workspaceId,
        configPath: flags.config,
        schemaPath: flags.schema,
        cwd: io.cwd,
        env: io.env,
        flags: toSettings(flags),
        backend: io.createBackend(),
        stdout: io.stdout,
        stderr: io.stderr,
      });
      io.setExitCode(result.exitCode);
    });

  program
    .command('validate')
    .description('Check the configuration and list the files a run would execute')
    .requiredOption('-f, --folder <path>', 'Folder containing .kql files')
    .option('-c, --config <path>', 'Configuration document (default: discovered)')
    .option('-s, --schema <path>', 'JSON Schema for the configuration document')
    .action(async (flags: CommonFlags) => {
      const result = await validateCommand({
        folder: flags.folder,
        configPath: flags.config,
        schemaPath: flags.schema,
        cwd: io.cwd,
        env: io.env,
        stderr: io.stderr,
      });

      if (result.success) {
        io.stdout.write(`Configuration: ${result.configFile ?? 'none (defaults)'}\n`);
        io.stdout.write(`Dialect: ${result.dialect ?? 'default'}\n`);
        io.stdout.write(`Query files (${result.files.length}):\n`);
        for (const file of result.files) {
          io.stdout.write(`  ${file}\n`);
        }
      }
      io.setExitCode(result.exitCode);
    });

  return program;
}
