import { ManualClock, monotonicClock } from '../../../src/utils/clock';

describe('Clock', () => {
  it('should keep the monotonic clock near wall-clock time', () => {
    expect(Math.abs(monotonicClock.now() - Date.now())).toBeLessThan(1000);
  });

  it('should never step the monotonic clock backwards', () => {
    const first = monotonicClock.now();
    const second = monotonicClock.now();

    expect(second).toBeGreaterThanOrEqual(first);
  });

  it('should move a manual clock only when told to', () => {
    const clock = new ManualClock(1000);

    clock.advance(250);
    expect(clock.now()).toBe(1250);

    clock.set(10);
    expect(clock.now()).toBe(10);
  });
});
