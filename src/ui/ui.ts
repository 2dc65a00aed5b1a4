/**
 * User-facing build output
 *
 * Steps report progress and failures through a Ui. It carries plain text
 * for the person running the build; diagnostics go to the logger.
 */

import type { Logger } from 'pino';

export interface Ui {
  /** Announce a step or milestone */
  say(message: string): void;
  /** Detail under the last announcement */
  message(message: string): void;
  /** A failure the user has to act on */
  error(message: string): void;
}

export interface LineWriter {
  write(chunk: string): unknown;
}

export interface BasicUiOptions {
  writer: LineWriter;
  /** Defaults to `writer` */
  errorWriter?: LineWriter;
}

/**
 * Ui that writes prefixed lines to streams
 */
export function createBasicUi(options: BasicUiOptions): Ui {
  const { writer } = options;
  const errorWriter = options.errorWriter ?? writer;
  return {
    say: (message) => writer.write(`==> ${message}\n`),
    message: (message) => writer.write(`    ${message}\n`),
    error: (message) => errorWriter.write(`${message}\n`),
  };
}

/**
 * Ui that forwards to a logger, for headless runs
 */
export function createLoggerUi(logger: Logger): Ui {
  return {
    say: (message) => logger.info({ ui: 'say' }, message),
    message: (message) => logger.info({ ui: 'message' }, message),
    error: (message) => logger.error({ ui: 'error' }, message),
  };
}
