export { Vault, type ReceiveHook } from './wallet.vault';
export { WalletController } from './wallet.controller';
export { createWalletRoutes } from './wallet.routes';
