/**
 * File I/O utilities for streaming the credential export line by line.
 */

import * as fs from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { READ_CHUNK_SIZE } from '../constants.js';
import { InputError } from '../errors.js';

const BYTE_ORDER_MARK = '\uFEFF';

/** Convert a failed fs call into an InputError. */
function toInputError(filePath: string, error: unknown): InputError {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return InputError.notFound(filePath);
  }
  return InputError.ioError(filePath, error instanceof Error ? error.message : String(error));
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Lazily yields the lines of a file in order.
 *
 * The file is opened on the first pull and closed when the generator
 * finishes, throws, or is abandoned by the consumer.
 * @param filePath The file to read
 * @param chunkSize Number of bytes read per call
 * @throws InputError with code 'not-found' or 'io'
 */
export function* readLines(
  filePath: string,
  chunkSize: number = READ_CHUNK_SIZE
): Generator<string, void, undefined> {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    throw toInputError(filePath, error);
  }

  try {
    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.alloc(chunkSize);
    let pending = '';
    let atStart = true;

    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
      } catch (error) {
        throw toInputError(filePath, error);
      }
      if (bytesRead === 0) {
        break;
      }

      pending += decoder.write(buffer.subarray(0, bytesRead));
      if (atStart && pending.length > 0) {
        if (pending.startsWith(BYTE_ORDER_MARK)) {
          pending = pending.slice(1);
        }
        atStart = false;
      }

      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        yield stripCarriageReturn(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    }

    pending += decoder.end();
    if (pending.length > 0) {
      yield stripCarriageReturn(pending);
    }
  } finally {
    fs.closeSync(fd);
  }
}
