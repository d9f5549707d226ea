import mongoose from 'mongoose';
import { config } from './index';
import { logger } from '../observability';

/**
 * MongoDB holds the durable copy of payment request records. The ledger
 * only connects when persistence is enabled.
 */

let isConnected = false;
let listenersAttached = false;

const READY_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

const attachConnectionListeners = (): void => {
  if (listenersAttached) return;
  listenersAttached = true;

  mongoose.connection.on('error', (err) => {
    logger.error({ err }, 'MongoDB connection error');
    isConnected = false;
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
    isConnected = false;
  });

  mongoose.connection.on('reconnected', () => {
    logger.info('MongoDB reconnected');
    isConnected = true;
  });
};

export const connectDatabase = async (): Promise<void> => {
  if (isConnected) {
    logger.debug('Database already connected');
    return;
  }

  attachConnectionListeners();

  const { uri, ...pool } = config.mongodb;
  try {
    const conn = await mongoose.connect(uri, pool);
    isConnected = true;
    logger.info({ host: conn.connection.host, maxPoolSize: pool.maxPoolSize }, 'MongoDB connected');
  } catch (error) {
    logger.error({ err: error }, 'MongoDB connection error');
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!isConnected) {
    return;
  }

  try {
    await mongoose.disconnect();
    isConnected = false;
    logger.info('MongoDB disconnected');
  } catch (error) {
    logger.error({ err: error }, 'MongoDB disconnection error');
    throw error;
  }
};

export const getDatabaseStatus = (): { connected: boolean; readyState: number; state: string } => {
  const { readyState } = mongoose.connection;
  return {
    connected: isConnected,
    readyState,
    state: READY_STATES[readyState] ?? 'unknown',
  };
};
