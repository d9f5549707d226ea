import { RequestStatus } from '../../types/events';
import type { ExpiryPolicy } from '../../config/environments';
import type { Clock } from '../../utils/clock';
import type { UnitOfWork } from './request.journal';

/**
 * Opaque caller identity (the verified JWT subject over HTTP)
 */
export type Identity = string;

export interface PaymentRequestRecord {
  id: number;
  requester: Identity;
  payer: Identity;
  /** Minor units of the single ledger currency */
  amount: number;
  /** Unix seconds; 0 means no deadline */
  deadline: number;
  status: RequestStatus;
  /** Unix seconds; present only while status is PAID */
  paidAt?: number;
  description: string;
}

export type NewRequestFields = Pick<
  PaymentRequestRecord,
  'requester' | 'payer' | 'amount' | 'deadline' | 'description'
>;

/**
 * Moves value between identities and the ledger's custody.
 * Both calls are all-or-nothing and report failure by returning false.
 */
export interface FundsCustody {
  receive(from: Identity, amount: number): boolean;
  transfer(to: Identity, amount: number): boolean;
}

export interface IdentityDirectory {
  exists(identity: Identity): boolean;
}

export interface LedgerEnvironment {
  clock: Clock;
  funds: FundsCustody;
  unitOfWork: UnitOfWork;
  expiryPolicy: ExpiryPolicy;
  /** When set, payers must be known to it */
  directory?: IdentityDirectory;
}

export type RecordChangeListener = (record: Readonly<PaymentRequestRecord>) => void;

export const isIdentity = (value: unknown): value is Identity =>
  typeof value === 'string' && value.trim().length > 0;
