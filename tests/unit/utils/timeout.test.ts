import { TimeoutError, sleep, withTimeout } from '../../../src/utils/timeout';

describe('withTimeout', () => {
  it('should resolve with the value when work finishes in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'ledger read')).resolves.toBe(42);
  });

  it('should pass through the rejection of the work', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'ledger read')).rejects.toThrow('boom');
  });

  it('should reject with TimeoutError when work is too slow', async () => {
    const slow = sleep(200).then(() => 'late');

    const result = withTimeout(slow, 10, 'ledger commit');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('ledger commit timed out after 10ms');
    await slow;
  });
});
