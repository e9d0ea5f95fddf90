/**
 * Scope-bound owner of a token that cancels it when the scope ends.
 */

import { CancellationToken } from './cancel.js';
import { getDefaultLogger, type Logger } from './observability/logger.js';

export class CancellationGuard {
  private readonly _token: CancellationToken;
  private readonly _logger: Logger | undefined;
  private _disposed: boolean = false;

  constructor(token?: CancellationToken, options?: { logger?: Logger }) {
    this._token = token ?? new CancellationToken();
    this._logger = options?.logger;
  }

  /**
   * Runs `fn` with the guard's token and cancels the token when `fn` returns
   * or throws. Workers holding a clone stop at their next check.
   */
  static run<T>(fn: (token: CancellationToken) => T, token?: CancellationToken): T {
    const guard = new CancellationGuard(token);
    try {
      return fn(guard.token);
    } finally {
      guard.dispose();
    }
  }

  static async runAsync<T>(
    fn: (token: CancellationToken) => Promise<T>,
    token?: CancellationToken,
  ): Promise<T> {
    const guard = new CancellationGuard(token);
    try {
      return await fn(guard.token);
    } finally {
      guard.dispose();
    }
  }

  get token(): CancellationToken {
    return this._token;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** Cancels the token. Only the first call has an effect. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this._token.cancel('guard disposed');
    (this._logger ?? getDefaultLogger()).trace('Cancellation guard disposed', { token: this._token.key });
  }
}
