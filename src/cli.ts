#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main() and parseArgs() for the sprig binary.
 * Handles file and stdin input, inline source, the REPL and --explain.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type CliConfig, type OutputMode } from './cli-config.js';
import { explainError } from './cli-explain.js';
import { runRepl, runSource } from './cli-run.js';
import { consoleIO, formatError } from './cli-shared.js';

/** Flags that change how input is handled */
export interface RunFlags {
  output?: OutputMode;
  trace?: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'file'; file: string; flags: RunFlags }
  | { mode: 'eval'; source: string; flags: RunFlags }
  | { mode: 'repl'; flags: RunFlags }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

/** Options that take the following argument as their value */
const VALUE_OPTIONS: ReadonlyMap<string, string> = new Map([
  ['-e', 'Missing source after -e'],
  ['--explain', 'Missing error ID after --explain'],
]);

/**
 * Parse command-line arguments into structured command
 *
 * `-e` and `--explain` consume the next argument whatever it looks like,
 * so `-e -v` is the source text `-v`. Help and version win over everything
 * else, then unknown options are rejected.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: RunFlags = {};
  const positionals: string[] = [];
  const values = new Map<string, string>();
  let help = false;
  let version = false;
  let repl = false;
  let unknown: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    const missing = VALUE_OPTIONS.get(arg);
    if (missing !== undefined) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(missing);
      }
      values.set(arg, value);
      i++;
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-v':
        version = true;
        break;
      case '--tokens':
        flags.output = 'tokens';
        break;
      case '--ast':
        flags.output = 'ast';
        break;
      case '--trace':
        flags.trace = true;
        break;
      case '--repl':
        repl = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          if (unknown === undefined) unknown = arg;
        } else {
          positionals.push(arg);
        }
    }
  }

  if (help) return { mode: 'help' };
  if (version) return { mode: 'version' };
  if (unknown !== undefined) {
    throw new Error(`Unknown option: ${unknown}`);
  }

  const errorId = values.get('--explain');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const inline = values.get('-e');

  if (repl) {
    if (inline !== undefined || positionals.length > 0) {
      throw new Error('--repl does not take a source argument');
    }
    return { mode: 'repl', flags };
  }

  if (inline !== undefined) {
    if (positionals.length > 0) {
      throw new Error(`Unexpected argument: ${positionals[0]}`);
    }
    return { mode: 'eval', source: inline, flags };
  }

  const [file, extra] = positionals;
  if (!file) {
    throw new Error('Missing file argument');
  }
  if (extra !== undefined) {
    throw new Error(`Unexpected argument: ${extra}`);
  }
  return { mode: 'file', file, flags };
}

/**
 * Command-line flags take precedence over the configuration file.
 */
export function applyFlags(config: CliConfig, flags: RunFlags): CliConfig {
  return {
    ...config,
    output: flags.output ?? config.output,
    trace: flags.trace ?? config.trace,
  };
}

/**
 * Read source from a file, or from stdin when the path is '-'.
 * @throws Error if the file does not exist
 */
export async function readSource(file: string): Promise<string> {
  if (file === '-') {
    // Read from stdin (must use sync API for stdin)
    return fsSync.readFileSync(0, 'utf-8');
  }

  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFile(file, 'utf-8');
}

const HELP_TEXT = `Usage:
  sprig <file> [options]      Parse a source file and print the result
  sprig - [options]           Read source from stdin
  sprig -e <source> [options] Parse source given on the command line
  sprig --repl [options]      Start an interactive read loop
  sprig --explain <id>        Show documentation for an error ID
  sprig --help                Show this help message
  sprig --version             Show version information

Options:
  --tokens   Print the token stream instead of the parsed program
  --ast      Print the parsed program (default)
  --trace    Print parse rule entry and exit lines

Configuration is read from .sprig.yaml in the working directory.

Examples:
  sprig program.sprig
  sprig -e "let x = 1 + 2 * 3;"
  echo "fn(a, b) { a + b }" | sprig - --tokens`;

async function readVersion(): Promise<string> {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  const packageJson: unknown = JSON.parse(
    await fs.readFile(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error('package.json has no version');
}

/**
 * Entry point for the sprig binary
 *
 * Parses command-line arguments, loads configuration and runs the
 * requested mode. Writes results to stdout and errors to stderr.
 * Sets process.exitCode to 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(HELP_TEXT);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Unknown error ID: ${parsed.errorId}`);
          process.exitCode = 1;
          return;
        }
        console.log(documentation);
        return;
      }

      case 'repl': {
        const config = applyFlags(loadConfig(process.cwd()), parsed.flags);
        await runRepl(
          config,
          { input: process.stdin, output: process.stdout },
          consoleIO
        );
        return;
      }

      case 'eval':
      case 'file': {
        const config = applyFlags(loadConfig(process.cwd()), parsed.flags);
        const source =
          parsed.mode === 'eval' ? parsed.source : await readSource(parsed.file);
        process.exitCode = runSource(source, config, consoleIO);
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
