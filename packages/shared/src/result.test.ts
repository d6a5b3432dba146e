import { trySync, tryAsync } from './result';

describe('Result', () => {
  it('captures synchronous throws', () => {
    const result = trySync(() => {
      throw 'plain string';
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe('plain string');
    }
    expect(trySync(() => 5)).toEqual({ ok: true, value: 5 });
  });

  it('captures rejections', async () => {
    const result = await tryAsync(() => Promise.reject(new Error('async boom')));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('async boom');
    }
    await expect(tryAsync(async () => 'done')).resolves.toEqual({ ok: true, value: 'done' });
  });
});
