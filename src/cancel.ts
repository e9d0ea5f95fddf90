/**
 * Cooperative cancellation flag shared between handles and worker threads.
 */

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import { InvalidInputError, OperationCancelledError } from './errors.js';
import { getDefaultLogger } from './observability/logger.js';

const CELL_BYTES = Int32Array.BYTES_PER_ELEMENT;

/**
 * Structured-clone friendly form of a token, for `postMessage` to a worker.
 */
export interface SharedCancellationToken {
  readonly id: string;
  readonly buffer: SharedArrayBuffer;
}

/**
 * A one-way cancellation flag.
 *
 * Every clone, and every handle rebuilt from {@link toShared} in another
 * worker, reads and writes the same cell. Equality, ordering and {@link key}
 * follow that shared identity, never the flag's value, so a token can serve
 * as a map key for the operation it guards.
 */
export class CancellationToken {
  private readonly _id: string;
  private readonly _buffer: SharedArrayBuffer;
  private readonly _cell: Int32Array;

  /**
   * Without arguments, creates a fresh token. With `shared`, attaches to that
   * token's cell as-is; use {@link fromShared} for values that arrived from
   * another thread.
   */
  constructor(shared?: SharedCancellationToken) {
    if (shared === undefined) {
      this._id = uuidv4();
      this._buffer = new SharedArrayBuffer(CELL_BYTES);
    } else {
      this._id = shared.id;
      this._buffer = shared.buffer;
    }
    this._cell = new Int32Array(this._buffer, 0, 1);
  }

  /** Rebuilds a handle from {@link toShared} output, validating it first. */
  static fromShared(shared: SharedCancellationToken): CancellationToken {
    if (!(shared.buffer instanceof SharedArrayBuffer) || shared.buffer.byteLength < CELL_BYTES) {
      throw new InvalidInputError('Shared token buffer must be a SharedArrayBuffer of at least 4 bytes');
    }
    if (typeof shared.id !== 'string' || !uuidValidate(shared.id)) {
      throw new InvalidInputError(`Shared token id is not a UUID: ${String(shared.id)}`);
    }
    return new CancellationToken(shared);
  }

  /** Creates a token that is cancelled when `signal` aborts. */
  static fromAbortSignal(signal: AbortSignal): CancellationToken {
    const token = new CancellationToken();
    if (signal.aborted) {
      token.cancel('abort signal');
    } else {
      signal.addEventListener('abort', () => token.cancel('abort signal'), { once: true });
    }
    return token;
  }

  /** Arbitrary but stable total order over token identities. */
  static compare(a: CancellationToken, b: CancellationToken): number {
    if (a._id === b._id) return 0;
    return a._id < b._id ? -1 : 1;
  }

  get isCancelled(): boolean {
    return Atomics.load(this._cell, 0) !== 0;
  }

  /** Identity key; equal for every clone of the same token. */
  get key(): string {
    return this._id;
  }

  clone(): CancellationToken {
    return new CancellationToken(this.toShared());
  }

  toShared(): SharedCancellationToken {
    return { id: this._id, buffer: this._buffer };
  }

  equals(other: CancellationToken): boolean {
    return this._id === other._id;
  }

  /**
   * Sets the flag. Safe to call from any handle, any number of times.
   *
   * Returns true only for the call that moved the token into the cancelled state.
   */
  cancel(reason?: string): boolean {
    const transitioned = Atomics.compareExchange(this._cell, 0, 0, 1) === 0;
    if (transitioned) {
      getDefaultLogger().debug('Cancellation requested', { token: this._id, reason: reason ?? null });
    }
    return transitioned;
  }

  /** Throws {@link OperationCancelledError} when cancelled. Never blocks. */
  check(operation?: string): void {
    if (Atomics.load(this._cell, 0) !== 0) {
      throw new OperationCancelledError(operation);
    }
  }

  toString(): string {
    return `CancellationToken(${this._id}, cancelled=${this.isCancelled})`;
  }
}
