import request from 'supertest';
import { createTestContext, TestContext } from '../helpers';

describe('Health Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('GET /', () => {
    it('should return API info', async () => {
      const response = await request(ctx.app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('name', 'ratelimited-ledger');
      expect(response.body).toHaveProperty('version', '1.0.0');
      expect(response.body).toHaveProperty('description');
    });
  });

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(ctx.app).get('/health/live');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'alive');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('GET /health', () => {
    it('should report the in-memory backends as healthy', async () => {
      const response = await request(ctx.app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        services: {
          ledgerStore: { backend: 'memory', connected: true },
          admission: { backend: 'memory', connected: true },
        },
        haltedAccounts: [],
      });
    });

    it('should list halted accounts', async () => {
      await ctx.core.transactions.openAccount('acct-1', 10);
      ctx.store.forceEntry({
        accountId: 'acct-1',
        balance: -1,
        version: 2,
        createdAt: new Date(0),
        updatedAt: new Date(0),
      });
      await ctx.core.transactions.submit({
        accountId: 'acct-1',
        identity: 'user-1',
        idempotencyKey: 'key-1',
        operationType: 'credit',
        amount: 1,
        expectedVersion: 2,
      });

      const response = await request(ctx.app).get('/health');

      expect(response.body.haltedAccounts).toEqual(['acct-1']);
    });
  });

  describe('GET /health/ready', () => {
    it('should return ready with in-memory backends', async () => {
      const response = await request(ctx.app).get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'ready');
    });
  });

  describe('correlation ids', () => {
    it('should echo a caller-supplied correlation id', async () => {
      const response = await request(ctx.app).get('/health/live').set('X-Correlation-Id', 'corr-123');

      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });

    it('should put the correlation id in error bodies', async () => {
      const response = await request(ctx.app).get('/accounts/acct-missing').set('X-Correlation-Id', 'corr-456');

      expect(response.body.error.correlationId).toBe('corr-456');
    });
  });
});
