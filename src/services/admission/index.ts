export {
  AdmissionController,
  AdmissionConfig,
  AdmissionDecision,
  IdentityClass,
  IdentityClassifier,
  classifyIdentity,
} from './admission.service';
export { Bucket, BucketPolicy, ConsumeResult, createBucket, consume, refill } from './bucket';
export { BucketStore, MemoryBucketStore } from './bucket.store';
export { RedisBucketStore, ScriptClient } from './redis.bucket.store';
