import { isErrorCode } from '../../types/errors';
import { LedgerEntry, OPERATION_TYPES, ResultSnapshot, TransactionReceipt } from '../../types/ledger';

/**
 * List every invariant the entry breaks; empty when the row is sound
 */
export const checkEntryInvariants = (entry: Pick<LedgerEntry, 'balance' | 'version'>): string[] => {
  const violations: string[] = [];

  if (!Number.isSafeInteger(entry.balance)) {
    violations.push(`balance ${entry.balance} is not a whole number of minor units`);
  } else if (entry.balance < 0) {
    violations.push(`balance ${entry.balance} is negative`);
  }

  if (!Number.isSafeInteger(entry.version) || entry.version < 1) {
    violations.push(`version ${entry.version} is not a positive integer`);
  }

  return violations;
};

/**
 * A committed successor must be exactly one version ahead
 */
export const checkTransition = (
  previous: Pick<LedgerEntry, 'version'>,
  next: Pick<LedgerEntry, 'balance' | 'version'>
): string[] => {
  const violations = checkEntryInvariants(next);
  if (next.version !== previous.version + 1) {
    violations.push(`version moved from ${previous.version} to ${next.version}`);
  }
  return violations;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseReceipt = (value: unknown): TransactionReceipt | null => {
  if (!isRecord(value)) return null;
  const { accountId, operationType, amount, newBalance, newVersion, timestamp } = value;
  const operation = OPERATION_TYPES.find((type) => type === operationType);
  if (
    typeof accountId !== 'string' ||
    operation === undefined ||
    typeof amount !== 'number' ||
    typeof newBalance !== 'number' ||
    typeof newVersion !== 'number' ||
    typeof timestamp !== 'string'
  ) {
    return null;
  }
  return { accountId, operationType: operation, amount, newBalance, newVersion, timestamp };
};

/**
 * Validate a result snapshot read back from storage
 */
export const parseResultSnapshot = (value: unknown): ResultSnapshot | null => {
  if (!isRecord(value)) return null;

  if (value.outcome === 'SUCCESS') {
    const receipt = parseReceipt(value.receipt);
    return receipt ? { outcome: 'SUCCESS', receipt } : null;
  }

  if (value.outcome === 'FAILED' && isRecord(value.failure)) {
    const { code, message, meta } = value.failure;
    if (!isErrorCode(code) || typeof message !== 'string') return null;
    return {
      outcome: 'FAILED',
      failure: isRecord(meta) ? { code, message, meta } : { code, message },
    };
  }

  return null;
};
