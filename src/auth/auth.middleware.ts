import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

const bearerToken = (req: AuthRequest): string => {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    throw ApiError.unauthorized('No authorization header provided');
  }

  if (!authHeader.startsWith('Bearer ')) {
    throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
  }

  const token = authHeader.substring(7);

  if (!token) {
    throw ApiError.unauthorized('No token provided');
  }

  return token;
};

/**
 * Resolve the caller identity from the bearer token
 */
export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const payload = authService.verifyToken(bearerToken(req));
    req.identity = payload.sub;
    addLogContext({ identity: payload.sub });
    next();
  } catch (error) {
    next(error);
  }
};
