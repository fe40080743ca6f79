import { body, header, param } from 'express-validator';

import { OPERATION_TYPES, SubmitRequest } from '../../types/ledger';
import { isValidAmount } from '../../utils/money';

export const ACCOUNT_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,64}$/;
export const IDEMPOTENCY_KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
export const MAX_IDENTITY_LENGTH = 128;

const addError = (errors: Record<string, string[]>, field: string, message: string): void => {
  if (!errors[field]) errors[field] = [];
  errors[field].push(message);
};

/**
 * Field errors for a submission, or null when it is well-formed.
 * The HTTP layer runs the express-validator chains below first; this check
 * guards callers that use the engine directly.
 */
export const validateSubmitRequest = (request: SubmitRequest): Record<string, string[]> | null => {
  const errors: Record<string, string[]> = {};

  if (!ACCOUNT_ID_PATTERN.test(request.accountId)) {
    addError(errors, 'accountId', 'Account ID must be 1-64 characters of letters, digits, _ . : -');
  }
  if (request.identity.length === 0 || request.identity.length > MAX_IDENTITY_LENGTH) {
    addError(errors, 'identity', `Identity must be 1-${MAX_IDENTITY_LENGTH} characters`);
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(request.idempotencyKey)) {
    addError(
      errors,
      'idempotencyKey',
      'Idempotency key must be alphanumeric with dashes/underscores, max 64 characters'
    );
  }
  if (!OPERATION_TYPES.includes(request.operationType)) {
    addError(errors, 'operationType', 'Operation type must be debit or credit');
  }
  if (!isValidAmount(request.amount)) {
    addError(errors, 'amount', 'Amount must be a positive number with at most 2 decimal places');
  }
  if (!Number.isSafeInteger(request.expectedVersion) || request.expectedVersion < 1) {
    addError(errors, 'expectedVersion', 'Expected version must be an integer of at least 1');
  }

  return Object.keys(errors).length > 0 ? errors : null;
};

const amountRule = body('amount')
  .notEmpty()
  .withMessage('Amount is required')
  .bail()
  .isFloat({ gt: 0 })
  .withMessage('Amount must be a positive number')
  .bail()
  .custom((value) => {
    if (!isValidAmount(Number(value))) {
      throw new Error('Amount can have at most 2 decimal places');
    }
    return true;
  })
  .toFloat();

const accountIdParam = param('accountId')
  .matches(ACCOUNT_ID_PATTERN)
  .withMessage('Account ID must be 1-64 characters of letters, digits, _ . : -');

export const openAccountValidation = [
  body('accountId')
    .notEmpty()
    .withMessage('Account ID is required')
    .bail()
    .isString()
    .matches(ACCOUNT_ID_PATTERN)
    .withMessage('Account ID must be 1-64 characters of letters, digits, _ . : -'),
  body('initialBalance')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Initial balance must be zero or positive')
    .bail()
    .custom((value) => {
      const amount = Number(value);
      if (amount !== 0 && !isValidAmount(amount)) {
        throw new Error('Initial balance can have at most 2 decimal places');
      }
      return true;
    })
    .toFloat(),
];

export const getAccountValidation = [accountIdParam];

export const submitTransactionValidation = [
  accountIdParam,
  body('operationType')
    .notEmpty()
    .withMessage('Operation type is required')
    .bail()
    .isIn([...OPERATION_TYPES])
    .withMessage('Operation type must be debit or credit'),
  amountRule,
  body('expectedVersion')
    .notEmpty()
    .withMessage('Expected version is required')
    .bail()
    .isInt({ min: 1 })
    .withMessage('Expected version must be an integer of at least 1')
    .toInt(),
  body('idempotencyKey')
    .optional()
    .isString()
    .matches(IDEMPOTENCY_KEY_PATTERN)
    .withMessage('Idempotency key must be alphanumeric with dashes/underscores, max 64 characters'),
  header('x-idempotency-key')
    .optional()
    .matches(IDEMPOTENCY_KEY_PATTERN)
    .withMessage(
      'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
    ),
  body('identity')
    .optional()
    .isString()
    .isLength({ min: 1, max: MAX_IDENTITY_LENGTH })
    .withMessage(`Identity must be 1-${MAX_IDENTITY_LENGTH} characters`),
];
