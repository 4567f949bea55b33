import { Interface } from 'node:readline';
import { PassThrough, Readable, Writable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import {
  fromHandle,
  fromIterable,
  head,
  isBrokenPipe,
  parseInteger,
  pipe,
  print,
  read,
  runEffect,
  stdoutLn,
  toHandle,
  toListM,
} from '../src';

/** Collects written chunks; fails every write with `failure` when given. */
function target(failure?: Error): { output: Writable; chunks: string[]; attempts: () => number } {
  const chunks: string[] = [];
  let attempts = 0;
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      attempts++;
      if (failure) {
        callback(failure);
        return;
      }
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, chunks, attempts: () => attempts };
}

const brokenPipe = () => Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });

describe('I/O', () => {
  describe('fromHandle', () => {
    it('emits one value per line and then terminates', async () => {
      expect(await toListM(fromHandle(Readable.from(['a\nb\n'])))).toEqual(['a', 'b']);
    });

    it('strips CRLF terminators and keeps an unterminated last line', async () => {
      expect(await toListM(fromHandle(Readable.from(['x\r\ny\r\n', 'z'])))).toEqual(['x', 'y', 'z']);
    });

    it('joins lines split across chunks', async () => {
      expect(await toListM(fromHandle(Readable.from(['he', 'llo\nwor', 'ld\n'])))).toEqual(['hello', 'world']);
    });

    it('closes the line reader when the consumer stops early', async () => {
      const close = vi.spyOn(Interface.prototype, 'close');
      const input = new PassThrough();
      input.write('first\nsecond\n');

      expect(await head(fromHandle(input))).toBe('first');
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('feeds read, which drops lines that fail to parse', async () => {
      const numbers = pipe(fromHandle(Readable.from(['1\nx\n2\n'])), read(parseInteger));
      expect(await toListM(numbers)).toEqual([1, 2]);
    });
  });

  describe('toHandle', () => {
    it('writes every value followed by a newline', async () => {
      const { output, chunks } = target();
      await runEffect(pipe(fromIterable(['a', 'b']), toHandle(output)));
      expect(chunks).toEqual(['a\n', 'b\n']);
    });

    it('propagates a broken pipe', async () => {
      const { output } = target(brokenPipe());
      await expect(runEffect(pipe(fromIterable(['a']), toHandle(output)))).rejects.toThrow('write EPIPE');
    });
  });

  describe('stdoutLn', () => {
    it('writes lines to the given output', async () => {
      const { output, chunks } = target();
      await runEffect(pipe(fromIterable(['one', 'two']), stdoutLn(output)));
      expect(chunks).toEqual(['one\n', 'two\n']);
    });

    it('stops quietly when the reader has gone away', async () => {
      const { output, attempts } = target(brokenPipe());
      await expect(runEffect(pipe(fromIterable(['a', 'b', 'c']), stdoutLn(output)))).resolves.toBeUndefined();
      expect(attempts()).toBe(1);
    });

    it('propagates any other write failure', async () => {
      const { output } = target(new Error('disk full'));
      await expect(runEffect(pipe(fromIterable(['a']), stdoutLn(output)))).rejects.toThrow('disk full');
    });
  });

  describe('print', () => {
    it('writes each value formatted by inspect', async () => {
      const { output, chunks } = target();
      await runEffect(pipe(fromIterable<unknown>([{ a: 1 }, 'hi']), print(output)));
      expect(chunks).toEqual(["{ a: 1 }\n", "'hi'\n"]);
    });
  });

  it('isBrokenPipe recognises EPIPE only', () => {
    expect(isBrokenPipe(brokenPipe())).toBe(true);
    expect(isBrokenPipe(new Error('other'))).toBe(false);
    expect(isBrokenPipe('EPIPE')).toBe(false);
  });
});
