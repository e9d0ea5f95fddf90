/**
 * Adds an in-memory buffer to any reader.
 */

import { InvalidInputError } from '../errors.js';
import * as defaults from './defaults.js';
import { SeekFrom, type BufRead, type Read, type Seek } from './types.js';

export const DEFAULT_BUF_SIZE = 8 * 1024;

export class BufReader<R extends Read> implements BufRead {
  private readonly _inner: R;
  private readonly _buf: Uint8Array;
  private _pos: number = 0;
  private _filled: number = 0;

  constructor(inner: R, capacity: number = DEFAULT_BUF_SIZE) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new InvalidInputError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this._inner = inner;
    this._buf = new Uint8Array(capacity);
  }

  get capacity(): number {
    return this._buf.length;
  }

  /** Bytes read from the source but not yet consumed. */
  get buffer(): Uint8Array {
    return this._buf.subarray(this._pos, this._filled);
  }

  getRef(): R {
    return this._inner;
  }

  /** Returns the reader. Buffered bytes are lost. */
  intoInner(): R {
    this._discard();
    return this._inner;
  }

  read(buf: Uint8Array): number {
    // A read at least as large as our buffer skips the copy when nothing is buffered.
    if (this._pos === this._filled && buf.length >= this._buf.length) {
      this._discard();
      return this._inner.read(buf);
    }
    const available = this.fillBuf();
    const n = Math.min(buf.length, available.length);
    buf.set(available.subarray(0, n));
    this.consume(n);
    return n;
  }

  fillBuf(): Uint8Array {
    if (this._pos >= this._filled) {
      this._filled = this._inner.read(this._buf);
      this._pos = 0;
    }
    return this._buf.subarray(this._pos, this._filled);
  }

  consume(amt: number): void {
    this._pos = Math.min(this._pos + amt, this._filled);
  }

  /**
   * Seeks the source. A `current` offset is relative to the logical position,
   * i.e. after the bytes already handed out. The buffer is dropped.
   */
  seek<S extends Read & Seek>(this: BufReader<S>, pos: SeekFrom): number {
    let result: number;
    if (pos.kind === 'current') {
      const remaining = this._filled - this._pos;
      result = this._inner.seek(SeekFrom.current(pos.offset - remaining));
    } else {
      result = this._inner.seek(pos);
    }
    this._discard();
    return result;
  }

  streamPosition<S extends Read & Seek>(this: BufReader<S>): number {
    return defaults.streamPosition(this._inner) - (this._filled - this._pos);
  }

  /** Moves within the buffer when possible, keeping it; otherwise seeks the source. */
  seekRelative<S extends Read & Seek>(this: BufReader<S>, offset: number): void {
    const target = this._pos + offset;
    if (target >= 0 && target <= this._filled) {
      this._pos = target;
      return;
    }
    this.seek(SeekFrom.current(offset));
  }

  private _discard(): void {
    this._pos = 0;
    this._filled = 0;
  }
}

export function bufReader<R extends Read>(inner: R, capacity?: number): BufReader<R> {
  return new BufReader(inner, capacity);
}
