import Redis from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability';
import { LedgerEvent } from '../types/events';

const log = createServiceLogger('event-bus');

/**
 * Redis pub/sub publisher for committed ledger events.
 * Each event goes to the channel named after its event type.
 */
class EventBus {
  private publisher: Redis | null = null;
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const publisher = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });

    await new Promise<void>((resolve, reject) => {
      publisher.once('ready', () => resolve());
      publisher.once('error', (err: Error) => reject(err));
    });

    publisher.on('error', (err: Error) => {
      log.error({ err }, 'Event bus connection error');
    });

    this.publisher = publisher;
    this.isConnected = true;
    log.info({ host: config.redis.host, port: config.redis.port }, 'Event bus connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(event: LedgerEvent): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    await this.publisher.publish(event.eventType, JSON.stringify(event));
    log.debug(
      { eventType: event.eventType, requestId: event.requestId, sequence: event.sequence },
      'Event published'
    );
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export const eventBus = new EventBus();
