import { RequestStatus } from '../../types/events';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for a payment request
 *
 * State Machine:
 *            ┌────────► PAID       (payer settles before the deadline)
 *            │
 * PENDING ───┼────────► CANCELLED  (requester withdraws)
 *            │
 *            └────────► EXPIRED    (payment attempted after the deadline)
 */
const validTransitions: Record<RequestStatus, RequestStatus[]> = {
  [RequestStatus.PENDING]: [RequestStatus.PAID, RequestStatus.CANCELLED, RequestStatus.EXPIRED],
  [RequestStatus.PAID]: [],      // Terminal state
  [RequestStatus.CANCELLED]: [], // Terminal state
  [RequestStatus.EXPIRED]: [],   // Terminal state
};

export function isValidTransition(
  currentStatus: RequestStatus,
  newStatus: RequestStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws ApiError if the transition is not allowed
 */
export function validateTransition(
  currentStatus: RequestStatus,
  newStatus: RequestStatus,
  requestId: number
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(currentStatus, newStatus, requestId);
  }
}

export function isTerminalState(status: RequestStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTransitions(status: RequestStatus): RequestStatus[] {
  return validTransitions[status];
}

/**
 * The failure reported when an operation meets a request that is no longer pending
 */
export function terminalStateError(status: RequestStatus, requestId: number): ApiError {
  switch (status) {
    case RequestStatus.PAID:
      return ApiError.alreadyPaid(requestId);
    case RequestStatus.CANCELLED:
      return ApiError.alreadyCancelled(requestId);
    case RequestStatus.EXPIRED:
      return ApiError.requestExpired(`Request ${requestId} has expired`);
    case RequestStatus.PENDING:
      return ApiError.internal(`Request ${requestId} is still pending`);
  }
}
