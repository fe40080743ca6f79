import mongoose, { Document, Schema } from 'mongoose';

export type IdempotencyStatus = 'PENDING' | 'COMPLETED';

export interface IIdempotencyRecord extends Document {
  accountId: string;
  idempotencyKey: string;
  status: IdempotencyStatus;
  fingerprint: string;
  reservationId: string;
  result?: unknown;
  leaseExpiresAt: Date;
  completedAt?: Date;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const idempotencyRecordSchema = new Schema<IIdempotencyRecord>(
  {
    accountId: {
      type: String,
      required: true,
    },
    idempotencyKey: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['PENDING', 'COMPLETED'],
    },
    fingerprint: {
      type: String,
      required: true,
    },
    reservationId: {
      type: String,
      required: true,
    },
    result: {
      type: Schema.Types.Mixed,
    },
    leaseExpiresAt: {
      type: Date,
      required: true,
    },
    completedAt: {
      type: Date,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

// One record per key per account
idempotencyRecordSchema.index({ accountId: 1, idempotencyKey: 1 }, { unique: true });

// Retention: MongoDB's TTL monitor drops records once expiresAt passes
idempotencyRecordSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const IdempotencyRecordModel = mongoose.model<IIdempotencyRecord>(
  'IdempotencyRecord',
  idempotencyRecordSchema
);
