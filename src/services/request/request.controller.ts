import { Response, NextFunction } from 'express';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability';
import { RequestLedger } from './request.ledger';
import { Identity, PaymentRequestRecord } from './request.types';

export interface PaymentRequestDTO {
  id: number;
  requester: string;
  payer: string;
  amount: number;
  deadline: number;
  status: string;
  paidAt: number | null;
  description: string;
}

export const toRequestDTO = (record: Readonly<PaymentRequestRecord>): PaymentRequestDTO => ({
  id: record.id,
  requester: record.requester,
  payer: record.payer,
  amount: record.amount,
  deadline: record.deadline,
  status: record.status,
  paidAt: record.paidAt ?? null,
  description: record.description,
});

const requireIdentity = (req: AuthRequest): Identity => {
  if (!req.identity) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.identity;
};

/**
 * Values below have been through express-validator's toInt()
 */
const integer = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw ApiError.validationError('Validation failed', { [field]: [`${field} must be an integer`] });
  }
  return value;
};

const text = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

export class RequestController {
  constructor(private readonly ledger: RequestLedger) {}

  /**
   * Create a payment request addressed to a payer
   * POST /requests
   */
  createRequest(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const requester = requireIdentity(req);
      const deadline = req.body.deadline === undefined ? 0 : integer(req.body.deadline, 'deadline');

      const id = this.ledger.createRequest(
        requester,
        text(req.body.payer),
        integer(req.body.amount, 'amount'),
        deadline,
        text(req.body.description)
      );
      addLogContext({ requestId: id });

      res.status(201).json({
        success: true,
        data: {
          request: toRequestDTO(this.ledger.getRequest(id)),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Settle a request as its payer
   * POST /requests/:id/pay
   */
  payRequest(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const payer = requireIdentity(req);
      const id = integer(req.params.id, 'id');
      addLogContext({ requestId: id });

      this.ledger.payRequest(payer, id, integer(req.body.value, 'value'));

      res.status(200).json({
        success: true,
        data: {
          request: toRequestDTO(this.ledger.getRequest(id)),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Withdraw a pending request as its requester
   * POST /requests/:id/cancel
   */
  cancelRequest(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const requester = requireIdentity(req);
      const id = integer(req.params.id, 'id');
      addLogContext({ requestId: id });

      this.ledger.cancelRequest(requester, id);

      res.status(200).json({
        success: true,
        data: {
          request: toRequestDTO(this.ledger.getRequest(id)),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  getRequest(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const id = integer(req.params.id, 'id');

      res.status(200).json({
        success: true,
        data: {
          request: toRequestDTO(this.ledger.getRequest(id)),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  isExpired(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const id = integer(req.params.id, 'id');

      res.status(200).json({
        success: true,
        data: {
          requestId: id,
          expired: this.ledger.isExpired(id),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  getNextRequestId(_req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      res.status(200).json({
        success: true,
        data: {
          nextRequestId: this.ledger.getNextRequestId(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /requests/events?after=<sequence>
   */
  getEvents(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const after = req.query.after === undefined ? 0 : integer(req.query.after, 'after');

      res.status(200).json({
        success: true,
        data: {
          events: this.ledger.getEvents(after),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  getRequesterRequests(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const { identity } = req.params;

      res.status(200).json({
        success: true,
        data: {
          identity,
          requestIds: this.ledger.getRequesterRequests(identity),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  getPayerRequests(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const { identity } = req.params;

      res.status(200).json({
        success: true,
        data: {
          identity,
          requestIds: this.ledger.getPayerRequests(identity),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
