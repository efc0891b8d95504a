/**
 * CLI Execution
 * One-shot parsing and the interactive read loop
 */

import { createInterface } from 'node:readline/promises';
import { parse, renderProgram, tokenize } from './index.js';
import type { ParseCallbacks } from './index.js';
import type { CliConfig } from './cli-config.js';
import {
  type CliIO,
  formatError,
  formatToken,
  formatTraceEvent,
} from './cli-shared.js';
import { TOKEN_TYPES } from './types.js';

/**
 * Scan or parse one source text and print the result.
 *
 * In `tokens` output every token before EOF is printed. In `ast` output the
 * rendered program is printed, or every recorded error when parsing failed.
 *
 * @returns Exit code: 0 on success, 1 when the input was rejected or had errors
 */
export function runSource(source: string, config: CliConfig, io: CliIO): number {
  if (config.maxInputLength !== null && source.length > config.maxInputLength) {
    io.error(
      `Input exceeds maximum length of ${config.maxInputLength} characters`
    );
    return 1;
  }

  if (config.output === 'tokens') {
    for (const token of tokenize(source)) {
      if (token.type === TOKEN_TYPES.EOF) break;
      io.log(formatToken(token));
    }
    return 0;
  }

  const callbacks: ParseCallbacks = config.trace
    ? { onTrace: (event) => io.log(formatTraceEvent(event)) }
    : {};
  const result = parse(source, { callbacks });

  if (!result.success) {
    for (const error of result.errors) {
      io.error(formatError(error));
    }
    return 1;
  }

  io.log(renderProgram(result.program));
  return 0;
}

export interface ReplStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Read lines until input ends, handling each with a fresh lexer and parser.
 * A bad line prints its errors and the loop carries on.
 */
export async function runRepl(
  config: CliConfig,
  streams: ReplStreams,
  io: CliIO
): Promise<void> {
  const rl = createInterface({
    input: streams.input,
    output: streams.output,
    terminal: false,
  });
  rl.setPrompt(config.prompt);

  try {
    rl.prompt();
    for await (const line of rl) {
      runSource(line, config, io);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
