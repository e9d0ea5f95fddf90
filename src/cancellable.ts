/**
 * Cancellable: makes a synchronous I/O resource abortable through a shared token.
 */

import type { CancellationToken } from './cancel.js';
import { InvalidInputError } from './errors.js';
import * as defaults from './io/defaults.js';
import type { BufRead, Read, Seek, SeekFrom, Write } from './io/types.js';
import { getDefaultLogger, type Logger } from './observability/logger.js';

type RequiredMember = 'read' | 'write' | 'flush' | 'seek' | 'fillBuf' | 'consume';

export interface CancellableOptions {
  /** Receives a debug entry the first time this wrapper refuses an operation. */
  logger?: Logger;
}

/**
 * Wraps one resource and checks the token before every delegated call.
 *
 * Operations exist for each capability the resource has: `read` and friends
 * need `Read`, `write` and friends need `Write`, and so on. A check that
 * fails throws {@link OperationCancelledError} before the resource is touched,
 * so buffers passed in stay as they were.
 *
 * Cancellation is only observed on entry. A delegated call already in
 * progress (a `readSync` waiting on a pipe, say) runs to completion; the
 * next call fails. How quickly a loop notices depends on how long each
 * underlying call blocks.
 *
 * `consume` is the one unchecked operation: it only moves a cursor over
 * bytes already buffered and cannot block.
 *
 * The capability check is by type only for direct calls. Through an
 * interface (`const r: Read = new Cancellable(sink, token)`) every method is
 * reachable, so a call the resource cannot serve throws
 * {@link InvalidInputError}.
 */
export class Cancellable<T> {
  private readonly _inner: T;
  private readonly _token: CancellationToken;
  private readonly _logger: Logger | undefined;
  private _released: boolean = false;
  private _refusalLogged: boolean = false;

  constructor(inner: T, token: CancellationToken, options?: CancellableOptions) {
    this._inner = inner;
    this._token = token;
    this._logger = options?.logger;
  }

  /** The shared token. Clone it to keep a handle elsewhere. */
  get token(): CancellationToken {
    return this._token;
  }

  getRef(): Readonly<T> {
    return this._held('getRef');
  }

  getMut(): T {
    return this._held('getMut');
  }

  /** Gives the resource back. The wrapper refuses every call afterwards. */
  intoInner(): T {
    const inner = this._held('intoInner');
    this._released = true;
    return inner;
  }

  // Read

  read<R extends Read>(this: Cancellable<R>, buf: Uint8Array): number {
    return this._enter('read', 'read').read(buf);
  }

  readVectored<R extends Read>(this: Cancellable<R>, bufs: Uint8Array[]): number {
    return defaults.readVectored(this._enter('readVectored', 'read'), bufs);
  }

  readToEnd<R extends Read>(this: Cancellable<R>): Uint8Array {
    return defaults.readToEnd(this._enter('readToEnd', 'read'));
  }

  readToString<R extends Read>(this: Cancellable<R>): string {
    return defaults.readToString(this._enter('readToString', 'read'));
  }

  readExact<R extends Read>(this: Cancellable<R>, buf: Uint8Array): void {
    defaults.readExact(this._enter('readExact', 'read'), buf);
  }

  // Write

  write<W extends Write>(this: Cancellable<W>, buf: Uint8Array): number {
    return this._enter('write', 'write').write(buf);
  }

  flush<W extends Write>(this: Cancellable<W>): void {
    this._enter('flush', 'flush').flush();
  }

  writeVectored<W extends Write>(this: Cancellable<W>, bufs: Uint8Array[]): number {
    return defaults.writeVectored(this._enter('writeVectored', 'write'), bufs);
  }

  writeAll<W extends Write>(this: Cancellable<W>, buf: Uint8Array): void {
    defaults.writeAll(this._enter('writeAll', 'write'), buf);
  }

  writeFmt<W extends Write>(this: Cancellable<W>, format: string, ...args: unknown[]): void {
    defaults.writeFmt(this._enter('writeFmt', 'write'), format, ...args);
  }

  // Seek

  seek<S extends Seek>(this: Cancellable<S>, pos: SeekFrom): number {
    return this._enter('seek', 'seek').seek(pos);
  }

  rewind<S extends Seek>(this: Cancellable<S>): void {
    defaults.rewind(this._enter('rewind', 'seek'));
  }

  streamPosition<S extends Seek>(this: Cancellable<S>): number {
    return defaults.streamPosition(this._enter('streamPosition', 'seek'));
  }

  seekRelative<S extends Seek>(this: Cancellable<S>, offset: number): void {
    defaults.seekRelative(this._enter('seekRelative', 'seek'), offset);
  }

  // BufRead

  fillBuf<B extends BufRead>(this: Cancellable<B>): Uint8Array {
    return this._enter('fillBuf', 'fillBuf').fillBuf();
  }

  consume<B extends BufRead>(this: Cancellable<B>, amt: number): void {
    const inner = this._held('consume');
    this._require(inner, 'consume', 'consume');
    inner.consume(amt);
  }

  private _held(operation: string): T {
    if (this._released) {
      throw new InvalidInputError(`Cannot call '${operation}': resource was already unwrapped`);
    }
    return this._inner;
  }

  private _enter(operation: string, member: RequiredMember): T {
    const inner = this._held(operation);
    try {
      this._token.check(operation);
    } catch (e) {
      this._logRefusal(operation);
      throw e;
    }
    this._require(inner, operation, member);
    return inner;
  }

  private _require(inner: T, operation: string, member: RequiredMember): void {
    const fn: unknown = typeof inner === 'object' && inner !== null ? Reflect.get(inner, member) : undefined;
    if (typeof fn !== 'function') {
      throw new InvalidInputError(`Cannot call '${operation}': resource has no '${member}' method`);
    }
  }

  private _logRefusal(operation: string): void {
    if (this._refusalLogged) return;
    this._refusalLogged = true;
    (this._logger ?? getDefaultLogger()).debug('Operation refused after cancellation', {
      token: this._token.key,
      operation,
    });
  }
}
