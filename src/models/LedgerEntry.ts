import mongoose, { Document, Schema } from 'mongoose';

export interface ILedgerEntry extends Document {
  accountId: string;
  /** Minor units */
  balance: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const ledgerEntrySchema = new Schema<ILedgerEntry>(
  {
    accountId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    balance: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
      validate: {
        validator: Number.isSafeInteger,
        message: 'balance must be a whole number of minor units',
      },
    },
    version: {
      type: Number,
      required: true,
      default: 1,
      min: 1,
    },
  },
  {
    timestamps: true,
  }
);

export const LedgerEntryModel = mongoose.model<ILedgerEntry>('LedgerEntry', ledgerEntrySchema);
