/**
 * Fallback implementations for the optional capability members.
 *
 * Each function uses the resource's own member when present and otherwise
 * builds the operation from the required ones.
 */

import { format } from 'node:util';
import {
  ErrorCodes,
  InvalidDataError,
  UnexpectedEofError,
  WriteZeroError,
  hasErrorCode,
} from '../errors.js';
import { SeekFrom, type Read, type Seek, type Write } from './types.js';

const DEFAULT_CHUNK_SIZE = 8 * 1024;

function retryInterrupted<T>(op: () => T): T {
  for (;;) {
    try {
      return op();
    } catch (e) {
      if (!hasErrorCode(e, ErrorCodes.INTERRUPTED)) throw e;
    }
  }
}

export function readVectored(reader: Read, bufs: Uint8Array[]): number {
  if (reader.readVectored) return reader.readVectored(bufs);
  const target = bufs.find((b) => b.length > 0);
  return target ? reader.read(target) : 0;
}

export function readToEnd(reader: Read): Uint8Array {
  if (reader.readToEnd) return reader.readToEnd();
  const chunks: Uint8Array[] = [];
  const chunk = new Uint8Array(DEFAULT_CHUNK_SIZE);
  let total = 0;
  for (;;) {
    const n = retryInterrupted(() => reader.read(chunk));
    if (n === 0) break;
    // copy: a view would pin the whole scratch buffer per short read
    chunks.push(chunk.slice(0, n));
    total += n;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function readToString(reader: Read): string {
  if (reader.readToString) return reader.readToString();
  const bytes = readToEnd(reader);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (e) {
    throw new InvalidDataError(undefined, { cause: e instanceof Error ? e : undefined });
  }
}

export function readExact(reader: Read, buf: Uint8Array): void {
  if (reader.readExact) {
    reader.readExact(buf);
    return;
  }
  let filled = 0;
  while (filled < buf.length) {
    const n = retryInterrupted(() => reader.read(buf.subarray(filled)));
    if (n === 0) throw new UnexpectedEofError(buf.length, filled);
    filled += n;
  }
}

export function writeVectored(writer: Write, bufs: Uint8Array[]): number {
  if (writer.writeVectored) return writer.writeVectored(bufs);
  const source = bufs.find((b) => b.length > 0);
  return source ? writer.write(source) : 0;
}

export function writeAll(writer: Write, buf: Uint8Array): void {
  if (writer.writeAll) {
    writer.writeAll(buf);
    return;
  }
  let written = 0;
  while (written < buf.length) {
    const n = retryInterrupted(() => writer.write(buf.subarray(written)));
    if (n === 0) throw new WriteZeroError(buf.length - written);
    written += n;
  }
}

export function writeFmt(writer: Write, fmt: string, ...args: unknown[]): void {
  if (writer.writeFmt) {
    writer.writeFmt(fmt, ...args);
    return;
  }
  writeAll(writer, new TextEncoder().encode(format(fmt, ...args)));
}

export function rewind(seeker: Seek): void {
  if (seeker.rewind) {
    seeker.rewind();
    return;
  }
  seeker.seek(SeekFrom.start(0));
}

export function streamPosition(seeker: Seek): number {
  if (seeker.streamPosition) return seeker.streamPosition();
  return seeker.seek(SeekFrom.current(0));
}

export function seekRelative(seeker: Seek, offset: number): void {
  if (seeker.seekRelative) {
    seeker.seekRelative(offset);
    return;
  }
  seeker.seek(SeekFrom.current(offset));
}
