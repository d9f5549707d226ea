import mongoose, { Document, Schema } from 'mongoose';

import { RequestStatus } from '../types/events';

export interface IPaymentRequest extends Document {
  requestId: number;
  requester: string;
  payer: string;
  amount: number;
  deadline: number;
  status: RequestStatus;
  paidAt?: number;
  description: string;
  createdAt: Date;
  updatedAt: Date;
}

const paymentRequestSchema = new Schema<IPaymentRequest>(
  {
    requestId: {
      type: Number,
      required: true,
      unique: true,
      index: true,
      min: 0,
    },
    requester: {
      type: String,
      required: true,
      index: true,
    },
    payer: {
      type: String,
      required: true,
      index: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 1,
    },
    deadline: {
      type: Number,
      required: true,
      default: 0,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(RequestStatus),
      default: RequestStatus.PENDING,
      index: true,
    },
    paidAt: {
      type: Number,
    },
    description: {
      type: String,
      default: '',
    },
  },
  {
    timestamps: true,
  }
);

paymentRequestSchema.index({ requester: 1, requestId: 1 });
paymentRequestSchema.index({ payer: 1, requestId: 1 });

export const PaymentRequest = mongoose.model<IPaymentRequest>('PaymentRequest', paymentRequestSchema);
