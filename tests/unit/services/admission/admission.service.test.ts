/**
 * Unit tests for the Admission Controller
 */

import {
  AdmissionConfig,
  AdmissionController,
  AdmissionDecision,
  MemoryBucketStore,
  classifyIdentity,
} from '../../../../src/services/admission';
import { admissionDecisionsTotal, registry } from '../../../../src/observability';
import { ManualClock } from '../../../../src/utils/clock';

const config: AdmissionConfig = {
  classes: {
    anonymous: { capacity: 2, refillRatePerSecond: 1 },
    authenticated: { capacity: 5, refillRatePerSecond: 5 },
    service: { capacity: 50, refillRatePerSecond: 25 },
  },
  idleEvictionMs: 60_000,
  sweepIntervalMs: 10_000,
};

describe('AdmissionController', () => {
  let clock: ManualClock;
  let store: MemoryBucketStore;
  let admission: AdmissionController;

  beforeEach(() => {
    registry.resetMetrics();
    clock = new ManualClock();
    store = new MemoryBucketStore();
    admission = new AdmissionController(config, { store, clock });
  });

  afterEach(() => {
    admission.stop();
  });

  describe('classifyIdentity', () => {
    it('should classify anon: identities as anonymous', () => {
      expect(classifyIdentity('anon:10.0.0.1')).toBe('anonymous');
    });

    it('should classify svc: identities as service', () => {
      expect(classifyIdentity('svc:settlement')).toBe('service');
    });

    it('should treat any other identity as authenticated', () => {
      expect(classifyIdentity('user-42')).toBe('authenticated');
    });
  });

  describe('tryAdmit', () => {
    it('should admit five then throttle five for capacity 5 at rate 5', async () => {
      const decisions: AdmissionDecision[] = [];
      for (let i = 0; i < 10; i++) {
        decisions.push(await admission.tryAdmit('user-1'));
      }

      expect(decisions.map((d) => d.admitted)).toEqual([
        true, true, true, true, true, false, false, false, false, false,
      ]);
      expect(decisions[5].retryAfterMs).toBe(200);
    });

    it('should apply the policy of the identity class', async () => {
      const first = await admission.tryAdmit('anon:10.0.0.1');
      await admission.tryAdmit('anon:10.0.0.1');
      const third = await admission.tryAdmit('anon:10.0.0.1');

      expect(first).toEqual({ admitted: true, identityClass: 'anonymous', remaining: 1, retryAfterMs: 0 });
      expect(third.admitted).toBe(false);
      expect(third.retryAfterMs).toBe(1000);
    });

    it('should keep identities independent', async () => {
      await admission.tryAdmit('anon:10.0.0.1');
      await admission.tryAdmit('anon:10.0.0.1');

      const other = await admission.tryAdmit('anon:10.0.0.2');

      expect(other.admitted).toBe(true);
    });

    it('should admit again after the refill interval', async () => {
      await admission.tryAdmit('anon:10.0.0.1');
      await admission.tryAdmit('anon:10.0.0.1');
      expect((await admission.tryAdmit('anon:10.0.0.1')).admitted).toBe(false);

      clock.advance(1000);

      expect((await admission.tryAdmit('anon:10.0.0.1')).admitted).toBe(true);
    });

    it('should count admitted and throttled decisions', async () => {
      await admission.tryAdmit('anon:10.0.0.1');
      await admission.tryAdmit('anon:10.0.0.1');
      await admission.tryAdmit('anon:10.0.0.1');

      const metric = await admissionDecisionsTotal.get();
      const byOutcome = Object.fromEntries(metric.values.map((v) => [String(v.labels.outcome), v.value]));

      expect(byOutcome).toEqual({ admitted: 2, throttled: 1 });
    });

    it('should honour a custom classifier', async () => {
      const custom = new AdmissionController(config, {
        store: new MemoryBucketStore(),
        clock,
        classify: () => 'service',
      });

      const decision = await custom.tryAdmit('anon:10.0.0.1');

      expect(decision.identityClass).toBe('service');
      expect(decision.remaining).toBe(49);
    });
  });

  describe('policyFor', () => {
    it('should return the policy for the identity class', () => {
      expect(admission.policyFor('svc:batch')).toEqual({ capacity: 50, refillRatePerSecond: 25 });
    });
  });

  describe('sweep', () => {
    it('should evict buckets idle for the eviction window', async () => {
      await admission.tryAdmit('user-1');
      clock.advance(30_000);
      await admission.tryAdmit('user-2');
      clock.advance(30_000);

      const evicted = await admission.sweep();

      expect(evicted).toBe(1);
      expect(store.peek('user-1')).toBeUndefined();
      expect(store.peek('user-2')).toBeDefined();
    });

    it('should start an evicted identity with a full bucket', async () => {
      for (let i = 0; i < 5; i++) await admission.tryAdmit('user-1');
      clock.advance(60_000);
      await admission.sweep();

      const decision = await admission.tryAdmit('user-1');

      expect(decision).toEqual({
        admitted: true,
        identityClass: 'authenticated',
        remaining: 4,
        retryAfterMs: 0,
      });
    });

    it('should keep an idle bucket that has not refilled to capacity', async () => {
      admission = new AdmissionController(
        {
          ...config,
          classes: { ...config.classes, authenticated: { capacity: 5, refillRatePerSecond: 1 } },
          idleEvictionMs: 100,
        },
        { store, clock }
      );
      for (let i = 0; i < 5; i++) await admission.tryAdmit('user-1');
      clock.advance(200);

      expect(await admission.sweep()).toBe(0);

      const decisions: AdmissionDecision[] = [];
      for (let i = 0; i < 5; i++) decisions.push(await admission.tryAdmit('user-1'));
      expect(decisions.map((d) => d.admitted)).toEqual([false, false, false, false, false]);
    });

    it('should evict that bucket once it has refilled', async () => {
      admission = new AdmissionController(
        {
          ...config,
          classes: { ...config.classes, authenticated: { capacity: 5, refillRatePerSecond: 1 } },
          idleEvictionMs: 100,
        },
        { store, clock }
      );
      for (let i = 0; i < 5; i++) await admission.tryAdmit('user-1');
      clock.advance(5_000);

      expect(await admission.sweep()).toBe(1);
      expect(store.peek('user-1')).toBeUndefined();
    });

    it('should keep recently seen buckets', async () => {
      await admission.tryAdmit('user-1');
      clock.advance(59_999);

      expect(await admission.sweep()).toBe(0);
      expect(store.size()).toBe(1);
    });
  });

  describe('constructor', () => {
    it('should reject an invalid class policy', () => {
      expect(
        () =>
          new AdmissionController({
            ...config,
            classes: { ...config.classes, anonymous: { capacity: 0, refillRatePerSecond: 1 } },
          })
      ).toThrow(RangeError);
    });
  });
});
