import { describe, it, expect, vi } from 'vitest';
import { failure, success, toResult } from '../../../src/utils/result.js';
import { AuthErrors } from '../../../src/utils/errors.js';

describe('AuthResult', () => {
  it('wraps values and errors', () => {
    const error = AuthErrors.TOKEN_INVALID();

    expect(success(1)).toEqual({ ok: true, value: 1 });
    expect(failure(error)).toEqual({ ok: false, error });
  });

  describe('toResult', () => {
    it('returns the value of a successful operation', async () => {
      const result = await toResult(async () => 'done', () => AuthErrors.TOKEN_INVALID());

      expect(result).toEqual({ ok: true, value: 'done' });
    });

    it('passes thrown AuthErrors through unchanged', async () => {
      const thrown = AuthErrors.TOKEN_EXPIRED();
      const onUnexpected = vi.fn(() => AuthErrors.TOKEN_INVALID());

      const result = await toResult(async () => {
        throw thrown;
      }, onUnexpected);

      expect(result).toEqual({ ok: false, error: thrown });
      expect(onUnexpected).not.toHaveBeenCalled();
    });

    it('maps any other fault through onUnexpected', async () => {
      const mapped = AuthErrors.TOKEN_REFRESH_FAILED();
      const fault = new Error('connection reset');
      const onUnexpected = vi.fn(() => mapped);

      const result = await toResult(async () => {
        throw fault;
      }, onUnexpected);

      expect(result).toEqual({ ok: false, error: mapped });
      expect(onUnexpected).toHaveBeenCalledWith(fault);
    });
  });
});
