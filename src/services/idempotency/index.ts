export {
  IdempotencyService,
  IdempotencyConfig,
  CheckOutcome,
  buildFingerprint,
} from './idempotency.service';
