/**
 * h3-to-geo-boundary command
 *
 * Reads H3 indexes from stdin, one per line, and writes each cell's
 * boundary to stdout as plain text or as a KML document.
 *
 *   h3-to-geo-boundary < indexes.txt
 *   h3-to-geo-boundary 1 "kml file" "h3 cells" < indexes.txt > cells.kml
 *
 * @module cli/program
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';

import {
  DEFAULT_KML_DESCRIPTION,
  DEFAULT_KML_NAME,
  EXIT_CODES,
  type ExitCode,
} from '../core/constants.js';
import { ConfigurationError, FilterError, RecordError } from '../core/errors.js';
import type { OutputMode, RunConfiguration } from '../core/types.js';
import { H3CellGeometry, type CellGeometry } from '../geometry/cell-geometry.js';
import { createOutputSink } from '../io/output-sink.js';
import { runBoundaryFilter } from '../pipeline/boundary-filter.js';
import { loadConfig, parseStrictInteger, toFilterOptions } from './lib/config.js';
import { createCLILogger, formatDuration, type CLILogger } from './lib/logger.js';

export const CLI_NAME = 'h3-to-geo-boundary';

/**
 * Process streams and environment the command runs against
 */
export interface CliIO {
  readonly stdin: AsyncIterable<Buffer | string>;
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  /** Grid library adapter; h3-js unless replaced */
  readonly geometry?: CellGeometry;
}

interface CliOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  maxRecordLength?: string;
  onError?: string;
  closeOnError?: boolean;
}

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(here, '..', '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

/**
 * Map the outputMode argument to an output mode
 *
 * @throws ConfigurationError unless the argument is the integer 0 or 1
 */
export function parseOutputMode(value: string): OutputMode {
  const mode = parseStrictInteger(value, 'outputMode');
  if (mode === 0) return 'text';
  if (mode === 1) return 'kml';
  throw new ConfigurationError('outputMode must be 0 or 1');
}

/**
 * Build the immutable run configuration from the positional arguments
 */
export function createRunConfiguration(
  outputMode: string,
  kmlName: string = DEFAULT_KML_NAME,
  kmlDescription: string = DEFAULT_KML_DESCRIPTION
): RunConfiguration {
  return Object.freeze({
    mode: parseOutputMode(outputMode),
    kmlName,
    kmlDescription,
  });
}

function isTTY(stream: Writable): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Run the command with user arguments (no node or script path)
 *
 * @returns Process exit code. Never calls process.exit, so pending
 *   stdout writes still flush.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<ExitCode> {
  let logger: CLILogger | null = null;

  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Convert H3 indexes on stdin to cell boundaries on stdout')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .argument('[outputMode]', '0 for plain text, 1 for KML', '0')
    .argument('[kmlName]', 'KML <name> (outputMode 1 only)', DEFAULT_KML_NAME)
    .argument('[kmlDesc]', 'KML <description> (outputMode 1 only)', DEFAULT_KML_DESCRIPTION)
    .option('-v, --verbose', 'Enable debug logging on stderr')
    .option('--json', 'Log as JSON lines')
    .option('--config <path>', 'Path to config file (default: .h3filterrc)')
    .option('--max-record-length <n>', 'Longest accepted input line in characters')
    .option('--on-error <policy>', 'Per-record error policy: fail|skip')
    .option('--close-on-error', 'Close the KML document before exiting on a fatal error')
    // Options go first; from the first positional on, words are literal text
    .passThroughOptions()
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .action(
      async (outputMode: string, kmlName: string, kmlDesc: string, options: CliOptions) => {
        const runConfig = createRunConfiguration(outputMode, kmlName, kmlDesc);

        const config = loadConfig({
          configPath: options.config,
          cwd: io.cwd,
          env: io.env,
          overrides: {
            verbose: options.verbose,
            json: options.json,
            maxRecordLength:
              options.maxRecordLength === undefined
                ? undefined
                : parseStrictInteger(options.maxRecordLength, '--max-record-length'),
            onError: options.onError,
            closeOnError: options.closeOnError,
          },
        });

        const log = createCLILogger({
          level: config.verbose ? 'debug' : 'warn',
          json: config.json,
          color: !config.json && isTTY(io.stderr),
          sink: io.stderr,
          command: CLI_NAME,
        });
        logger = log;
        log.debug('Starting run', {
          mode: runConfig.mode,
          configPath: config.configPath,
          onError: config.onError,
          maxRecordLength: config.maxRecordLength,
        });

        const stats = await runBoundaryFilter({
          input: io.stdin,
          sink: createOutputSink(io.stdout),
          config: runConfig,
          options: toFilterOptions(config),
          geometry: io.geometry ?? new H3CellGeometry(),
          logger: log,
        });

        log.debug('Run completed', {
          ...stats,
          duration: formatDuration(log.elapsedMs()),
        });
      }
    );

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    return reportFailure(error, logger, io.stderr);
  }

  return EXIT_CODES.SUCCESS;
}

/**
 * Keep an output stream failure (EPIPE from a closed reader, typically)
 * from surfacing as an uncaught 'error' event
 *
 * Errors seen while the run is going are held until `finish`; a run that
 * otherwise succeeded then fails with one report line. Errors after
 * `finish` are reported at once through `onLateFailure`.
 *
 * @returns `finish`, to be called with runCli's exit code
 */
export function guardOutputStream(
  stdout: Writable,
  stderr: Writable,
  onLateFailure: (exitCode: ExitCode) => void
): (exitCode: ExitCode) => ExitCode {
  let heldError: Error | null = null;
  let finished = false;

  const report = (error: Error): ExitCode => {
    stderr.write(`Error: writing output: ${error.message}\n`);
    return EXIT_CODES.ERRORS;
  };

  stdout.on('error', (error: Error) => {
    if (finished) {
      onLateFailure(report(error));
    } else {
      heldError ??= error;
    }
  });

  return (exitCode) => {
    finished = true;
    if (heldError && exitCode === EXIT_CODES.SUCCESS) {
      return report(heldError);
    }
    return exitCode;
  };
}

function reportFailure(error: unknown, logger: CLILogger | null, stderr: Writable): ExitCode {
  if (error instanceof CommanderError) {
    // Commander has already printed the message (and help, for usage errors)
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }

  const message = error instanceof Error ? error.message : String(error);
  const exitCode = error instanceof FilterError ? error.exitCode : EXIT_CODES.ERRORS;

  if (logger) {
    logger.error('Run failed', {
      error: message,
      ...(error instanceof RecordError && error.line !== undefined ? { line: error.line } : {}),
      exitCode,
    });
  } else {
    const prefix = error instanceof ConfigurationError ? 'Configuration error' : 'Error';
    stderr.write(`${prefix}: ${message}\n`);
  }

  return exitCode;
}
