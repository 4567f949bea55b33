import { createInterface } from 'node:readline';
import type { Writable } from 'node:stream';
import { inspect } from 'node:util';
import type { Parser, Sink, Source } from './types';
import { bind, liftEffect, unit } from './step';
import { bracket } from './scope';
import { awaitValue, pipe } from './compose';
import { read } from './operators';
import { consumeWith } from './sinks';
import { fromAsyncIterable } from './sources';
import { createLogger } from './logger';

const log = createLogger('io');

/**
 * Emits one text value per line of `input`, without the line terminator.
 * Ends cleanly at end of input.
 */
export function fromHandle(input: NodeJS.ReadableStream): Source<string, void> {
  return bracket(
    () => createInterface({ input, crlfDelay: Infinity }),
    (lines) => lines.close(),
    (lines) => fromAsyncIterable(lines)
  );
}

export function stdinLn(): Source<string, void> {
  return fromHandle(process.stdin);
}

/** Lines of stdin that `parse` accepts; the rest are dropped. */
export function readLn<A>(parse: Parser<A>): Source<A, void> {
  return pipe(stdinLn(), read(parse));
}

export function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    // A failed write is also reported as an 'error' event; this listener
    // stays registered on failure so that the event has a handler.
    const onError = (error: Error) => reject(error);
    output.once('error', onError);
    output.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      output.removeListener('error', onError);
      resolve();
    });
  });
}

export function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EPIPE';
}

/** Writes every line to `output`; any write failure propagates. */
export function toHandle(output: Writable): Sink<string, never> {
  return consumeWith((line: string) => writeLine(output, line));
}

/**
 * Writes every line to `output` (stdout by default). A reader that went away
 * (EPIPE) ends the sink without an error; other failures propagate.
 */
export function stdoutLn(output: Writable = process.stdout): Sink<string, void> {
  const writeUnlessClosed = async (line: string): Promise<boolean> => {
    try {
      await writeLine(output, line);
      return true;
    } catch (error) {
      if (!isBrokenPipe(error)) throw error;
      log.debug({ err: error }, 'output closed by its reader, stopping');
      return false;
    }
  };

  const loop = (): Sink<string, void> =>
    bind(awaitValue<string>(), (line) =>
      bind(liftEffect(() => writeUnlessClosed(line)), (written): Sink<string, void> => (written ? loop() : unit))
    );
  return loop();
}

/** Like {@link stdoutLn}, without the broken-pipe handling. */
export function stdoutLnUnchecked(output: Writable = process.stdout): Sink<string, never> {
  return toHandle(output);
}

export function print<A>(output: Writable = process.stdout, format: (value: A) => string = (value) => inspect(value)): Sink<A, never> {
  return consumeWith((value: A) => writeLine(output, format(value)));
}
