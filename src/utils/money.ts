/**
 * Amounts travel as major units with at most two fractional digits and are
 * stored as integer minor units so ledger arithmetic stays exact.
 */

const MINOR_PER_MAJOR = 100;

export const isValidAmount = (amount: number): boolean => {
  if (!Number.isFinite(amount) || amount <= 0) return false;
  const scaled = amount * MINOR_PER_MAJOR;
  const rounded = Math.round(scaled);
  return Math.abs(scaled - rounded) < 1e-6 && Number.isSafeInteger(rounded);
};

/**
 * Convert a major-unit amount to minor units.
 * Throws RangeError for values that do not fit two decimals.
 */
export const toMinorUnits = (amount: number): number => {
  const scaled = amount * MINOR_PER_MAJOR;
  const rounded = Math.round(scaled);
  if (!Number.isFinite(amount) || Math.abs(scaled - rounded) >= 1e-6 || !Number.isSafeInteger(rounded)) {
    throw new RangeError(`Amount ${amount} is not representable with two decimal places`);
  }
  return rounded;
};

export const fromMinorUnits = (minor: number): number => {
  return minor / MINOR_PER_MAJOR;
};
