// src/lib/ipc/lines.ts
import type { Readable } from 'node:stream';
import { ReadlineParser } from '@serialport/parser-readline';

export type LineHandlers = {
  /** Each trimmed, non-empty line, in order. */
  line: (line: string) => void;
  /** After the last line. `overflowed` when reading stopped at an oversized line. */
  end?: (overflowed: boolean) => void;
};

const NL = 0x0a;

/**
 * Splits `source` into newline-terminated lines through a ReadlineParser.
 * A last line without a newline is delivered when the source ends. Once the
 * unterminated tail grows past `maxLineBytes` the lines before it are still
 * delivered, then reading stops.
 */
export function readLines(source: Readable, handlers: LineHandlers, maxLineBytes = Infinity): ReadlineParser {
  const parser = new ReadlineParser({ delimiter: '\n', encoding: 'utf8' });
  let tail = 0;
  let overflowed = false;

  parser.on('data', (raw: Buffer | string) => {
    const line = (typeof raw === 'string' ? raw : raw.toString('utf8')).trim();
    if (line) handlers.line(line);
  });
  parser.on('end', () => handlers.end?.(overflowed));

  source.on('data', (chunk: Buffer | string) => {
    if (overflowed) return;
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    const last = buf.lastIndexOf(NL);
    tail = last < 0 ? tail + buf.length : buf.length - last - 1;
    if (tail <= maxLineBytes) {
      parser.write(buf);
      return;
    }
    overflowed = true;
    if (last >= 0) parser.write(buf.subarray(0, last + 1));
    // the oversized line is never delivered, not even on flush
    parser.buffer = Buffer.alloc(0);
    parser.end();
  });
  source.on('end', () => {
    if (!overflowed) parser.end();
  });

  return parser;
}
