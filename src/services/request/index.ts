export { RequestLedger, type LedgerOperation } from './request.ledger';
export { RequestStore, type StatusUpdate } from './request.store';
export { RequestEventLog } from './request.eventLog';
export { UnitOfWork, Journal } from './request.journal';
export { RequestController, toRequestDTO, type PaymentRequestDTO } from './request.controller';
export { RequestPersistence, restoreLedger } from './request.persistence';
export { MongoRequestRepository, type RequestRepository } from './request.repository';
export {
  registerRequestEventPublisher,
  unregisterRequestEventPublisher,
  flushRequestEvents,
} from './request.events';
export {
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
  terminalStateError,
} from './request.state';
export * from './request.types';
export { createRequestRoutes } from './request.routes';
