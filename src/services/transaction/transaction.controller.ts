import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { OperationType, SubmitRequest, TransactionReceipt } from '../../types/ledger';
import { ReplayedError, ThrottledError } from '../ledger/ledger.errors';
import { TransactionService } from './transaction.service';

export const IDEMPOTENCY_KEY_HEADER = 'x-idempotency-key';
export const CALLER_IDENTITY_HEADER = 'x-caller-identity';
export const REPLAYED_HEADER = 'X-Idempotent-Replayed';

interface OpenAccountBody {
  accountId: string;
  initialBalance?: number;
}

interface SubmitBody {
  identity?: string;
  idempotencyKey?: string;
  operationType: OperationType;
  amount: number;
  expectedVersion: number;
}

/**
 * Identity resolution order: body, header, then an anonymous identity
 * derived from the client address
 */
export const resolveIdentity = (req: Request, bodyIdentity?: string): string => {
  if (bodyIdentity) return bodyIdentity;
  const header = req.get(CALLER_IDENTITY_HEADER);
  if (header) return header;
  return `anon:${req.ip ?? 'unknown'}`;
};

const sendReceipt = (res: Response, receipt: TransactionReceipt): void => {
  res.status(201).json({
    success: true,
    data: {
      transaction: receipt,
    },
  });
};

export class TransactionController {
  constructor(private readonly ledger: TransactionService) {}

  /**
   * Open an account
   * POST /accounts
   */
  async openAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { accountId, initialBalance }: OpenAccountBody = req.body;
      const account = await this.ledger.openAccount(accountId, initialBalance ?? 0);

      res.status(201).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Get current balance and version
   * GET /accounts/:accountId
   */
  async getAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.ledger.getAccount(req.params.accountId);

      res.status(200).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Apply a debit or credit
   * POST /accounts/:accountId/transactions
   */
  async submit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body: SubmitBody = req.body;
      const idempotencyKey = body.idempotencyKey ?? req.get(IDEMPOTENCY_KEY_HEADER);
      if (!idempotencyKey) {
        throw ApiError.validationError('Validation failed', {
          idempotencyKey: ['Idempotency key is required in the body or the X-Idempotency-Key header'],
        });
      }

      const request: SubmitRequest = {
        accountId: req.params.accountId,
        identity: resolveIdentity(req, body.identity),
        idempotencyKey,
        operationType: body.operationType,
        amount: body.amount,
        expectedVersion: body.expectedVersion,
      };

      // Client went away before we answered; only honoured up to the commit
      const abort = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) abort.abort();
      });

      const result = await this.ledger.submit(request, { signal: abort.signal });

      switch (result.status) {
        case 'SUCCESS':
          sendReceipt(res, result.receipt);
          return;
        case 'DUPLICATE':
          res.setHeader(REPLAYED_HEADER, 'true');
          if (result.priorResult.outcome === 'SUCCESS') {
            sendReceipt(res, result.priorResult.receipt);
            return;
          }
          throw new ReplayedError(result.priorResult.failure);
        case 'REJECTED':
          if (result.error instanceof ThrottledError) {
            res.setHeader('Retry-After', String(Math.max(1, Math.ceil(result.error.retryAfterMs / 1000))));
          }
          throw result.error;
      }
    } catch (error) {
      next(error);
    }
  }
}
