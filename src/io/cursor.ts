/**
 * In-memory byte stream with a movable position.
 */

import { InvalidInputError } from '../errors.js';
import type { BufRead, Seek, SeekFrom, Write } from './types.js';

function seekBase(pos: SeekFrom, current: number, length: number): number {
  switch (pos.kind) {
    case 'start':
      return 0;
    case 'current':
      return current;
    case 'end':
      return length;
  }
}

/** Absolute position for `pos`, rejecting negative or non-integer targets. */
export function resolveSeek(pos: SeekFrom, current: number, length: number): number {
  const target = seekBase(pos, current, length) + pos.offset;
  if (!Number.isSafeInteger(target)) {
    throw new InvalidInputError(`Invalid seek offset: ${pos.offset}`);
  }
  if (target < 0) {
    throw new InvalidInputError('Invalid seek to a negative position');
  }
  return target;
}

/**
 * Reads, writes and seeks over a byte array.
 *
 * Writing past the end grows the data; a gap left by seeking beyond the end
 * and then writing is zero-filled. Reading past the end returns 0.
 *
 * The initial bytes are copied, so writes never reach the caller's array.
 */
export class Cursor implements BufRead, Write, Seek {
  private _data: Uint8Array;
  private _length: number;
  private _position: number = 0;

  constructor(data?: Uint8Array) {
    this._data = data ? data.slice() : new Uint8Array(0);
    this._length = this._data.length;
  }

  get position(): number {
    return this._position;
  }

  set position(value: number) {
    this._position = resolveSeek({ kind: 'start', offset: value }, this._position, this._length);
  }

  get length(): number {
    return this._length;
  }

  /** The written bytes, as a view over the cursor's storage. */
  get data(): Uint8Array {
    return this._data.subarray(0, this._length);
  }

  read(buf: Uint8Array): number {
    const remaining = this.fillBuf();
    const n = Math.min(buf.length, remaining.length);
    buf.set(remaining.subarray(0, n));
    this._position += n;
    return n;
  }

  fillBuf(): Uint8Array {
    const start = Math.min(this._position, this._length);
    return this._data.subarray(start, this._length);
  }

  consume(amt: number): void {
    this._position += amt;
  }

  write(buf: Uint8Array): number {
    const end = this._position + buf.length;
    this._reserve(end);
    this._data.set(buf, this._position);
    this._length = Math.max(this._length, end);
    this._position = end;
    return buf.length;
  }

  flush(): void {
    // writes land in memory directly
  }

  seek(pos: SeekFrom): number {
    this._position = resolveSeek(pos, this._position, this._length);
    return this._position;
  }

  private _reserve(capacity: number): void {
    if (capacity <= this._data.length) return;
    const grown = new Uint8Array(Math.max(capacity, this._data.length * 2));
    grown.set(this._data.subarray(0, this._length));
    this._data = grown;
  }
}
