import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { Identity, isIdentity } from '../services/request/request.types';

import { JWTPayload } from './auth.types';

export class AuthService {
  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly expiresIn: string = config.jwt.accessTokenExpiresIn
  ) {}

  /**
   * Sign an access token for an identity
   */
  issueToken(identity: Identity): string {
    if (!isIdentity(identity)) {
      throw ApiError.validationError('Cannot issue a token for a blank identity');
    }

    const options: SignOptions = {
      subject: identity,
      expiresIn: this.expiresIn as jwt.SignOptions['expiresIn'],
    };

    return jwt.sign({}, this.secret, options);
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || !isIdentity(decoded.sub)) {
      throw ApiError.invalidToken('Token has no subject');
    }

    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  }
}

export const authService = new AuthService();
