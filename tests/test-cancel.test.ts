import { describe, it, expect, afterEach, vi } from 'vitest';
import { validate } from 'uuid';
import { CancellationToken } from '../src/cancel.js';
import { ErrorCodes, InvalidInputError, OperationCancelledError } from '../src/errors.js';
import { Logger, getDefaultLogger, setDefaultLogger } from '../src/observability/logger.js';
import { createBufferOutput } from './helpers.js';

vi.mock('uuid', async (importOriginal) => {
  const actual = await importOriginal<typeof import('uuid')>();
  return { ...actual, validate: vi.fn(actual.validate) };
});

describe('CancellationToken', () => {
  it('is initially not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
  });

  it('sets flag after cancel()', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.isCancelled).toBe(true);
  });

  it('check() does nothing when not cancelled', () => {
    const token = new CancellationToken();
    expect(() => token.check()).not.toThrow();
  });

  it('check() throws OperationCancelledError with EPIPE when cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.check()).toThrow(OperationCancelledError);
    try {
      token.check('read');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(OperationCancelledError);
      if (e instanceof OperationCancelledError) {
        expect(e.code).toBe(ErrorCodes.CANCELLED);
        expect(e.operation).toBe('read');
        expect(e.syscall).toBe('read');
      }
    }
  });

  it('never returns to the live state once cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    for (let i = 0; i < 5; i++) {
      expect(() => token.check()).toThrow(OperationCancelledError);
      expect(token.isCancelled).toBe(true);
    }
  });

  it('cancel() is idempotent and reports only the first transition', () => {
    const token = new CancellationToken();
    expect(token.cancel()).toBe(true);
    expect(token.cancel()).toBe(false);
    expect(token.clone().cancel()).toBe(false);
    expect(token.isCancelled).toBe(true);
  });

  it('has no reset', () => {
    const token = new CancellationToken();
    expect('reset' in token).toBe(false);
  });
});

describe('CancellationToken clones', () => {
  it('share the flag in both directions', () => {
    const a = new CancellationToken();
    const b = a.clone();
    b.cancel();
    expect(a.isCancelled).toBe(true);

    const c = new CancellationToken();
    const d = c.clone();
    c.cancel();
    expect(d.isCancelled).toBe(true);
  });

  it('do not affect independently constructed tokens', () => {
    const a = new CancellationToken();
    const b = new CancellationToken();
    a.cancel();
    expect(b.isCancelled).toBe(false);
  });
});

describe('CancellationToken identity', () => {
  it('clones compare equal and share a key', () => {
    const a = new CancellationToken();
    const b = a.clone();
    expect(a.equals(b)).toBe(true);
    expect(b.equals(a)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(CancellationToken.compare(a, b)).toBe(0);
  });

  it('independent tokens are never equal, whatever their state', () => {
    const a = new CancellationToken();
    const b = new CancellationToken();
    expect(a.equals(b)).toBe(false);
    a.cancel();
    b.cancel();
    expect(a.equals(b)).toBe(false);
    expect(a.key).not.toBe(b.key);
  });

  it('equality does not change when a clone is cancelled', () => {
    const a = new CancellationToken();
    const b = a.clone();
    b.cancel();
    expect(a.equals(b)).toBe(true);
  });

  it('compare() is antisymmetric for distinct tokens', () => {
    const a = new CancellationToken();
    const b = new CancellationToken();
    const ab = CancellationToken.compare(a, b);
    expect(ab).not.toBe(0);
    expect(CancellationToken.compare(b, a)).toBe(-ab);
  });

  it('key works as a map key for clones', () => {
    const a = new CancellationToken();
    const b = new CancellationToken();
    const labels = new Map<string, string>([
      [a.key, 'upload'],
      [b.key, 'download'],
    ]);
    expect(labels.get(a.clone().key)).toBe('upload');
    expect(labels.get(b.clone().key)).toBe('download');
  });

  it('toString shows identity and state', () => {
    const token = new CancellationToken();
    expect(token.toString()).toBe(`CancellationToken(${token.key}, cancelled=false)`);
    token.cancel();
    expect(token.toString()).toBe(`CancellationToken(${token.key}, cancelled=true)`);
  });
});

describe('CancellationToken shared form', () => {
  it('fromShared rebuilds an equal handle over the same flag', () => {
    const token = new CancellationToken();
    const rebuilt = CancellationToken.fromShared(token.toShared());
    expect(rebuilt.equals(token)).toBe(true);
    rebuilt.cancel();
    expect(token.isCancelled).toBe(true);
  });

  it('rejects a buffer that is too small', () => {
    const id = new CancellationToken().key;
    expect(() => CancellationToken.fromShared({ id, buffer: new SharedArrayBuffer(2) })).toThrow(
      InvalidInputError,
    );
  });

  it('validates on fromShared but not on clone', () => {
    const token = new CancellationToken();
    vi.mocked(validate).mockClear();
    const copy = token.clone().clone();
    expect(copy.equals(token)).toBe(true);
    expect(validate).not.toHaveBeenCalled();
    CancellationToken.fromShared(token.toShared());
    expect(validate).toHaveBeenCalledTimes(1);
  });

  it('rejects an id that is not a UUID', () => {
    expect(() =>
      CancellationToken.fromShared({ id: 'not-a-uuid', buffer: new SharedArrayBuffer(4) }),
    ).toThrow(InvalidInputError);
  });
});

describe('CancellationToken.fromAbortSignal', () => {
  it('cancels when the signal aborts', () => {
    const controller = new AbortController();
    const token = CancellationToken.fromAbortSignal(controller.signal);
    expect(token.isCancelled).toBe(false);
    controller.abort();
    expect(token.isCancelled).toBe(true);
  });

  it('is cancelled immediately for an aborted signal', () => {
    const token = CancellationToken.fromAbortSignal(AbortSignal.abort());
    expect(token.isCancelled).toBe(true);
  });
});

describe('CancellationToken logging', () => {
  const original = getDefaultLogger();

  afterEach(() => {
    setDefaultLogger(original);
  });

  it('logs one debug entry per token, on the first cancel', () => {
    const { output, lines } = createBufferOutput();
    setDefaultLogger(new Logger({ level: 'debug', output }));
    const token = new CancellationToken();
    token.cancel('shutdown');
    token.cancel('again');
    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('debug');
    expect(parsed.message).toBe('Cancellation requested');
    expect(parsed.extra).toEqual({ token: token.key, reason: 'shutdown' });
  });
});
