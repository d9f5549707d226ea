import { Router, Request, Response, NextFunction } from 'express';
import { WalletController } from './wallet.controller';
import { Vault } from './wallet.vault';
import { authMiddleware } from '../../auth';
import { depositValidation } from './wallet.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createWalletRoutes = (vault: Vault): Router => {
  const router = Router();
  const controller = new WalletController(vault);

  // All wallet routes require authentication
  router.use(authMiddleware);

  // GET /wallets/me - Balance of the caller
  router.get('/me', (req: Request, res: Response, next: NextFunction) => controller.getMyWallet(req, res, next));

  // POST /wallets/me/deposit - Deposit funds
  router.post('/me/deposit', depositValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.deposit(req, res, next));

  return router;
};
