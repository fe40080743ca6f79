import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { TransactionController } from './transaction.controller';
import { TransactionService } from './transaction.service';
import {
  getAccountValidation,
  openAccountValidation,
  submitTransactionValidation,
} from './transaction.validation';

export const createAccountRoutes = (service: TransactionService): Router => {
  const router = Router();
  const controller = new TransactionController(service);

  // POST /accounts - Open an account
  router.post(
    '/',
    openAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.openAccount(req, res, next)
  );

  // GET /accounts/:accountId - Current balance and version
  router.get(
    '/:accountId',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getAccount(req, res, next)
  );

  // POST /accounts/:accountId/transactions - Debit or credit
  router.post(
    '/:accountId/transactions',
    submitTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.submit(req, res, next)
  );

  return router;
};
