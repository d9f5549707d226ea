export { authService, AuthService } from './auth.service';
export { authMiddleware } from './auth.middleware';
export * from './auth.types';
