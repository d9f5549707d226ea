import { Router, Request, Response, NextFunction } from 'express';
import { RequestController } from './request.controller';
import { RequestLedger } from './request.ledger';
import { authMiddleware } from '../../auth';
import {
  createRequestValidation,
  payRequestValidation,
  requestIdValidation,
  identityParamValidation,
  eventsQueryValidation,
} from './request.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createRequestRoutes = (ledger: RequestLedger): Router => {
  const router = Router();
  const controller = new RequestController(ledger);

  // POST /requests - Create a payment request (caller is the requester)
  router.post('/', authMiddleware, createRequestValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.createRequest(req, res, next));

  // GET /requests/next-id - Id the next request will get
  router.get('/next-id', (req: Request, res: Response, next: NextFunction) => controller.getNextRequestId(req, res, next));

  // GET /requests/events - Committed ledger events
  router.get('/events', eventsQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getEvents(req, res, next));

  // GET /requests/requester/:identity - Ids of requests an identity created
  router.get('/requester/:identity', identityParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getRequesterRequests(req, res, next));

  // GET /requests/payer/:identity - Ids of requests addressed to an identity
  router.get('/payer/:identity', identityParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getPayerRequests(req, res, next));

  // GET /requests/:id - Request details
  router.get('/:id', requestIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getRequest(req, res, next));

  // GET /requests/:id/expired - Whether the deadline lapsed while pending
  router.get('/:id/expired', requestIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.isExpired(req, res, next));

  // POST /requests/:id/pay - Settle a request (caller is the payer)
  router.post('/:id/pay', authMiddleware, payRequestValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.payRequest(req, res, next));

  // POST /requests/:id/cancel - Cancel a pending request (caller is the requester)
  router.post('/:id/cancel', authMiddleware, requestIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.cancelRequest(req, res, next));

  return router;
};
