import { PaymentRequest } from '../../models';
import { RequestStatus } from '../../types/events';
import { PaymentRequestRecord } from './request.types';

/**
 * Durable storage of request records, keyed by request id
 */
export interface RequestRepository {
  save(record: Readonly<PaymentRequestRecord>): Promise<void>;
  loadAll(): Promise<PaymentRequestRecord[]>;
}

interface StoredRequest {
  requestId: number;
  requester: string;
  payer: string;
  amount: number;
  deadline: number;
  status: RequestStatus;
  paidAt?: number | null;
  description?: string | null;
}

export const toRecord = (doc: StoredRequest): PaymentRequestRecord => {
  const record: PaymentRequestRecord = {
    id: doc.requestId,
    requester: doc.requester,
    payer: doc.payer,
    amount: doc.amount,
    deadline: doc.deadline,
    status: doc.status,
    description: doc.description ?? '',
  };
  if (doc.paidAt !== undefined && doc.paidAt !== null) {
    record.paidAt = doc.paidAt;
  }
  return record;
};

export class MongoRequestRepository implements RequestRepository {
  async save(record: Readonly<PaymentRequestRecord>): Promise<void> {
    const update =
      record.paidAt === undefined
        ? { $set: this.fields(record), $unset: { paidAt: 1 } }
        : { $set: { ...this.fields(record), paidAt: record.paidAt } };

    await PaymentRequest.findOneAndUpdate({ requestId: record.id }, update, {
      upsert: true,
      setDefaultsOnInsert: true,
    });
  }

  async loadAll(): Promise<PaymentRequestRecord[]> {
    const docs = await PaymentRequest.find().sort({ requestId: 1 }).lean<StoredRequest[]>();
    return docs.map(toRecord);
  }

  private fields(record: Readonly<PaymentRequestRecord>) {
    return {
      requestId: record.id,
      requester: record.requester,
      payer: record.payer,
      amount: record.amount,
      deadline: record.deadline,
      status: record.status,
      description: record.description,
    };
  }
}
