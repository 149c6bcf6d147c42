import type { CompileLogEvent } from './types.js';

export type Logger = (event: CompileLogEvent) => void;

export interface LoggerOptions {
  readonly pretty?: boolean;
  readonly stream?: NodeJS.WritableStream;
}

/**
 * Writes each build event as one JSON line: `content_build.stage` on every
 * state transition, `content_document.rejected` per diagnostic, then a
 * single `content_build.completed` or `content_build.failed`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { pretty = false, stream = process.stdout } = options;

  return (event) => {
    const serialized = JSON.stringify(event, undefined, pretty ? 2 : undefined);
    stream.write(`${serialized}\n`);
  };
}

export const silentLogger: Logger = () => {};
