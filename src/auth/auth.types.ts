import { Request } from 'express';

import { Identity } from '../services/request/request.types';

/**
 * Claims the API reads from a bearer token. The subject is the caller
 * identity used for every ledger operation.
 */
export interface JWTPayload {
  sub: Identity;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  identity?: Identity;
}
