#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point.
 *
 * ```
 * valrun [options] [patterns...]
 * ```
 *
 * Exit codes: 0 all selected test cases fine, 1 some phase failed, errored or
 * was interrupted, 2 usage error, 130 run aborted by the user.
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { createContainer } from './composition';
import { parseContextVariables } from './core/contextVariables';
import { errorMessage, PatternFileError, RunAbortedError, UsageError } from './core/errors';
import { Logger } from './core/logger';
import * as Tokens from './core/tokens';
import { DEFAULT_ACTIONS, parsePhaseLetters } from './testcase/phaseSelection';

const log = Logger.for('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;
export const EXIT_ABORTED = 130;

/**
 * Parsed command-line options.
 */
type CliOptions = {
  actions: string;
  testRoot: string;
  workRoot: string;
  reportFile?: string;
  patternFile: string[];
  set: string[];
  list?: boolean;
  config?: string;
  verbose?: boolean;
};

/**
 * Streams the CLI writes to.
 */
export interface CliIo {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  env?: NodeJS.ProcessEnv;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Build the commander program.
 */
export function buildProgram(io: CliIo): Command {
  return new Command()
    .name('valrun')
    .description('Run prepare/run/check/report/cleanup phases over validation test cases, resuming where the last run stopped')
    .argument('[patterns...]', 'test-case glob patterns relative to the test root')
    .option('-a, --actions <letters>', 'phases to run: p=prepare r=run t=check s=report c=cleanup', DEFAULT_ACTIONS)
    .option('-t, --test-root <dir>', 'directory containing the test cases', '.')
    .option('-w, --work-root <dir>', 'directory for the work directories', './work')
    .option('-r, --report-file <file>', 'write detailed logs to this file')
    .option('-f, --pattern-file <file>', 'file with one pattern per line (repeatable)', collect, [])
    .option('-s, --set <key=value>', 'context variable passed to every tester (repeatable)', collect, [])
    .option('-l, --list', 'only list the resolved test cases')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('-v, --verbose', 'enable debug logging for all components')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => { io.stdout.write(text); },
      writeErr: (text) => { io.stderr.write(text); },
    });
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const program = buildProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const writeErr = (line: string): void => { io.stderr.write(`${line}\n`); };
  Logger.initialize({ debug: options.verbose ? 'all' : [], writeLine: writeErr });

  try {
    const phases = parsePhaseLetters(options.actions);
    const externalContext = parseContextVariables(options.set);
    const container = createContainer({ configFile: options.config, env: io.env, stdout: io.stdout });

    const config = container.resolve(Tokens.RunConfigManager);
    Logger.initialize({ debug: options.verbose ? 'all' : config.debugComponents, writeLine: writeErr });

    const summary = await container.resolve(Tokens.Orchestrator).execute({
      testRoot: options.testRoot,
      workRoot: options.workRoot,
      patternFiles: options.patternFile,
      patterns: program.args,
      phases,
      externalContext,
      reportFile: options.reportFile,
      listOnly: options.list,
    });

    if (summary.unsuccessful.length > 0) {
      log.info(`${summary.unsuccessful.length} test case(s) not successful`, summary.unsuccessful);
      return EXIT_FAILURES;
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError || error instanceof PatternFileError) {
      writeErr(`valrun: ${error.message}`);
      return EXIT_USAGE;
    }
    if (error instanceof RunAbortedError) {
      writeErr('valrun: run aborted');
      return EXIT_ABORTED;
    }
    log.error(`Unexpected failure: ${errorMessage(error)}`, error);
    return EXIT_FAILURES;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }).then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FAILURES;
    },
  );
}
