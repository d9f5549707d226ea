import { Response, NextFunction } from 'express';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { Vault } from './wallet.vault';

export class WalletController {
  constructor(private readonly vault: Vault) {}

  /**
   * Get current identity's balance
   * GET /wallets/me
   */
  getMyWallet(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      if (!req.identity) {
        throw ApiError.unauthorized('Not authenticated');
      }

      res.status(200).json({
        success: true,
        data: {
          wallet: {
            identity: req.identity,
            balance: this.vault.balanceOf(req.identity),
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Deposit funds to the caller's balance
   * POST /wallets/me/deposit
   */
  deposit(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      if (!req.identity) {
        throw ApiError.unauthorized('Not authenticated');
      }

      const amount: unknown = req.body.amount;
      if (typeof amount !== 'number') {
        throw ApiError.invalidAmount();
      }

      const newBalance = this.vault.deposit(req.identity, amount);

      res.status(200).json({
        success: true,
        data: {
          message: 'Deposit successful',
          newBalance,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
