import { config, ExpiryPolicy } from './config';
import { MonotonicClock, Clock } from './utils/clock';
import { UnitOfWork } from './services/request/request.journal';
import { RequestLedger } from './services/request/request.ledger';
import { RequestRepository } from './services/request/request.repository';
import { RequestPersistence, restoreLedger } from './services/request/request.persistence';
import { IdentityDirectory, LedgerEnvironment } from './services/request/request.types';
import { Vault } from './services/wallet/wallet.vault';

/**
 * What the HTTP layer serves: one ledger and the custody it settles through
 */
export interface AppContext {
  ledger: RequestLedger;
  vault: Vault;
  persistence?: RequestPersistence;
}

export interface LedgerContext extends AppContext {
  unitOfWork: UnitOfWork;
  clock: Clock;
}

export interface LedgerContextOptions {
  clock?: Clock;
  expiryPolicy?: ExpiryPolicy;
  directory?: IdentityDirectory;
}

const buildEnvironment = (options: LedgerContextOptions) => {
  const unitOfWork = new UnitOfWork();
  const vault = new Vault(unitOfWork);
  const clock = options.clock ?? new MonotonicClock();
  const env: LedgerEnvironment = {
    clock,
    funds: vault,
    unitOfWork,
    expiryPolicy: options.expiryPolicy ?? config.ledger.expiryPolicy,
    directory: options.directory,
  };
  return { env, vault };
};

export const createLedgerContext = (options: LedgerContextOptions = {}): LedgerContext => {
  const { env, vault } = buildEnvironment(options);
  return { ledger: RequestLedger.create(env), vault, unitOfWork: env.unitOfWork, clock: env.clock };
};

export const restoreLedgerContext = async (
  repository: RequestRepository,
  options: LedgerContextOptions = {}
): Promise<LedgerContext> => {
  const { env, vault } = buildEnvironment(options);
  const ledger = await restoreLedger(repository, env);
  return { ledger, vault, unitOfWork: env.unitOfWork, clock: env.clock };
};
