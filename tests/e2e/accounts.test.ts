import request from 'supertest';
import { createTestContext, TestContext } from '../helpers';

describe('Account Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('POST /accounts', () => {
    it('should open an account at version 1', async () => {
      const response = await request(ctx.app)
        .post('/accounts')
        .send({ accountId: 'acct-1', initialBalance: 1000 });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        success: true,
        data: {
          account: {
            accountId: 'acct-1',
            balance: 1000,
            version: 1,
            createdAt: '2024-01-01T00:00:00.000Z',
            updatedAt: '2024-01-01T00:00:00.000Z',
          },
        },
      });
    });

    it('should default the initial balance to zero', async () => {
      const response = await request(ctx.app).post('/accounts').send({ accountId: 'acct-1' });

      expect(response.status).toBe(201);
      expect(response.body.data.account.balance).toBe(0);
    });

    it('should return 409 for an existing account', async () => {
      await request(ctx.app).post('/accounts').send({ accountId: 'acct-1' });

      const response = await request(ctx.app).post('/accounts').send({ accountId: 'acct-1' });

      expect(response.status).toBe(409);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe(3003);
      expect(response.body.error.message).toBe('Account acct-1 already exists');
    });

    it('should return 400 for an invalid account id', async () => {
      const response = await request(ctx.app).post('/accounts').send({ accountId: 'has space' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
      expect(response.body.error.details).toHaveProperty('accountId');
    });
  });

  describe('GET /accounts/:accountId', () => {
    it('should return balance and version', async () => {
      await request(ctx.app).post('/accounts').send({ accountId: 'acct-1', initialBalance: 12.34 });

      const response = await request(ctx.app).get('/accounts/acct-1');

      expect(response.status).toBe(200);
      expect(response.body.data.account).toMatchObject({ accountId: 'acct-1', balance: 12.34, version: 1 });
    });

    it('should return 404 for an unknown account', async () => {
      const response = await request(ctx.app).get('/accounts/acct-missing');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 3002,
        message: 'Account acct-missing not found',
      });
      expect(response.body.error).toHaveProperty('correlationId');
      expect(response.body.error).toHaveProperty('timestamp');
    });

    it('should return 503 when storage is unavailable', async () => {
      jest.spyOn(ctx.store, 'getEntry').mockRejectedValueOnce(new Error('socket closed'));

      const response = await request(ctx.app).get('/accounts/acct-1');

      expect(response.status).toBe(503);
      expect(response.headers['x-retryable']).toBe('true');
      expect(response.body.error.code).toBe(5002);
    });
  });

  describe('unknown routes', () => {
    it('should return 404 with the route in the message', async () => {
      const response = await request(ctx.app).delete('/accounts/acct-1');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 3010,
        message: 'Route DELETE /accounts/acct-1 not found',
      });
    });
  });
});
