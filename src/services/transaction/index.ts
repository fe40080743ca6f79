export {
  TransactionService,
  TransactionServiceOptions,
  SubmitResult,
  SubmitOptions,
  AccountView,
  toAccountView,
} from './transaction.service';
export {
  TransactionController,
  resolveIdentity,
  IDEMPOTENCY_KEY_HEADER,
  CALLER_IDENTITY_HEADER,
  REPLAYED_HEADER,
} from './transaction.controller';
export { validateSubmitRequest } from './transaction.validation';
export { createAccountRoutes } from './transaction.routes';
