/**
 * Blocking file-descriptor stream built on the synchronous `node:fs` calls.
 */

import { closeSync, fstatSync, fsyncSync, openSync, readSync, writeSync } from 'node:fs';
import type { Mode } from 'node:fs';
import { InvalidInputError } from '../errors.js';
import { resolveSeek } from './cursor.js';
import type { Read, Seek, SeekFrom, Write } from './types.js';

/**
 * Reads, writes and seeks a file descriptor.
 *
 * The position is tracked here and passed to every `readSync`/`writeSync`,
 * so it is independent of the descriptor's own offset. Descriptors that
 * cannot seek (pipes, sockets, TTYs) must be opened with `positional: false`.
 */
export class FileStream implements Read, Write, Seek {
  private readonly _fd: number;
  private readonly _positional: boolean;
  private readonly _append: boolean;
  private _position: number;
  private _closed: boolean = false;

  constructor(fd: number, options?: { position?: number; positional?: boolean; append?: boolean }) {
    this._fd = fd;
    this._position = options?.position ?? 0;
    this._positional = options?.positional ?? true;
    this._append = options?.append ?? false;
  }

  /** Opens `path` with the given `fs.open` flags ('r', 'w+', 'a', ...). */
  static open(path: string, flags: string = 'r', mode?: Mode): FileStream {
    const fd = openSync(path, flags, mode);
    const append = flags.includes('a');
    return new FileStream(fd, { append, position: append ? fstatSync(fd).size : 0 });
  }

  get fd(): number {
    return this._fd;
  }

  get closed(): boolean {
    return this._closed;
  }

  read(buf: Uint8Array): number {
    this._assertOpen('read');
    const n = readSync(this._fd, buf, 0, buf.length, this._positional ? this._position : null);
    this._position += n;
    return n;
  }

  write(buf: Uint8Array): number {
    this._assertOpen('write');
    // O_APPEND ignores the position argument on Linux, so the real offset is the file size.
    const position = this._positional && !this._append ? this._position : null;
    const n = writeSync(this._fd, buf, 0, buf.length, position);
    this._position = this._append ? fstatSync(this._fd).size : this._position + n;
    return n;
  }

  /** Unbuffered: there is nothing to flush. Use {@link sync} to reach the disk. */
  flush(): void {
    this._assertOpen('flush');
  }

  sync(): void {
    this._assertOpen('sync');
    fsyncSync(this._fd);
  }

  seek(pos: SeekFrom): number {
    this._assertOpen('seek');
    if (!this._positional) {
      throw new InvalidInputError('Stream is not seekable');
    }
    const length = pos.kind === 'end' ? fstatSync(this._fd).size : 0;
    this._position = resolveSeek(pos, this._position, length);
    return this._position;
  }

  streamPosition(): number {
    this._assertOpen('streamPosition');
    return this._position;
  }

  /** Closes the descriptor. Wrappers never call this. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    closeSync(this._fd);
  }

  private _assertOpen(operation: string): void {
    if (this._closed) {
      throw new InvalidInputError(`Cannot call '${operation}' on a closed file`);
    }
  }
}
