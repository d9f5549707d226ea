/**
 * EventBus Unit Tests
 *
 * Tests the Redis publisher for ledger events.
 */

import { EventType, LedgerEvent } from '../../../src/types/events';

// Mock Redis
const mockOn = jest.fn();
const mockOnce = jest.fn();
const mockQuit = jest.fn().mockResolvedValue('OK');
const mockPublish = jest.fn().mockResolvedValue(1);
const mockRedis = jest.fn();

jest.mock('ioredis', () => {
  return mockRedis.mockImplementation(() => ({
    on: mockOn,
    once: mockOnce,
    quit: mockQuit,
    publish: mockPublish,
  }));
});

// Mock config
jest.mock('../../../src/config', () => ({
  config: {
    redis: {
      host: 'localhost',
      port: 6379,
    },
  },
}));

// Mock logger
const mockLogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
};
jest.mock('../../../src/observability', () => ({
  createServiceLogger: () => mockLogger,
}));

const createdEvent: LedgerEvent = {
  eventType: EventType.REQUEST_CREATED,
  requestId: 7,
  sequence: 3,
  timestamp: 1_700_000_000,
  payload: { requester: 'alice', payer: 'bob', amount: 100, deadline: 0, description: 'rent' },
};

describe('EventBus', () => {
  let eventBus: typeof import('../../../src/events/eventBus').eventBus;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();

    // Simulate an immediate ready signal
    mockOnce.mockImplementation((event: string, callback: () => void) => {
      if (event === 'ready') {
        setImmediate(() => callback());
      }
    });

    const module = await import('../../../src/events/eventBus');
    eventBus = module.eventBus;
  });

  afterEach(async () => {
    await eventBus.disconnect();
  });

  describe('getStatus', () => {
    it('should return connected: false initially', () => {
      expect(eventBus.getStatus()).toEqual({ connected: false });
    });
  });

  describe('connect', () => {
    it('should connect successfully when Redis is ready', async () => {
      await eventBus.connect();
      expect(eventBus.getStatus().connected).toBe(true);
    });

    it('should not reconnect if already connected', async () => {
      await eventBus.connect();
      await eventBus.connect();

      expect(mockRedis).toHaveBeenCalledTimes(1);
      expect(eventBus.getStatus().connected).toBe(true);
    });

    it('should pass the configured host and port to Redis', async () => {
      await eventBus.connect();

      expect(mockRedis).toHaveBeenCalledWith(
        expect.objectContaining({ host: 'localhost', port: 6379, maxRetriesPerRequest: 3 })
      );
    });

    it('should keep logging connection errors after connecting', async () => {
      await eventBus.connect();

      const errorCall = mockOn.mock.calls.find((call) => call[0] === 'error');
      expect(errorCall).toBeDefined();
    });

    it('should handle connection errors', async () => {
      mockOnce.mockImplementation((event: string, callback: (err?: Error) => void) => {
        if (event === 'error') {
          setImmediate(() => callback(new Error('Connection refused')));
        }
      });

      await expect(eventBus.connect()).rejects.toThrow('Connection refused');
      expect(eventBus.getStatus().connected).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('should disconnect successfully', async () => {
      await eventBus.connect();
      expect(eventBus.getStatus().connected).toBe(true);

      await eventBus.disconnect();
      expect(eventBus.getStatus().connected).toBe(false);
    });

    it('should call quit on the publisher once', async () => {
      await eventBus.connect();
      await eventBus.disconnect();

      expect(mockQuit).toHaveBeenCalledTimes(1);
    });

    it('should handle disconnect when not connected', async () => {
      await eventBus.disconnect();

      expect(mockQuit).not.toHaveBeenCalled();
      expect(eventBus.getStatus().connected).toBe(false);
    });
  });

  describe('publish', () => {
    it('should publish the event to the channel of its type', async () => {
      await eventBus.connect();

      await eventBus.publish(createdEvent);

      expect(mockPublish).toHaveBeenCalledWith(EventType.REQUEST_CREATED, JSON.stringify(createdEvent));
    });

    it('should keep sequence and request id in the message', async () => {
      await eventBus.connect();

      await eventBus.publish(createdEvent);

      const message = JSON.parse(mockPublish.mock.calls[0][1]);
      expect(message).toMatchObject({ requestId: 7, sequence: 3, timestamp: 1_700_000_000 });
    });

    it('should throw when not connected', async () => {
      await expect(eventBus.publish(createdEvent)).rejects.toThrow('Event bus not connected');
      expect(mockPublish).not.toHaveBeenCalled();
    });
  });

  describe('retry strategy', () => {
    it('should back off and give up after 3 retries', async () => {
      await eventBus.connect();

      const options = mockRedis.mock.calls[0][0];
      expect(options.retryStrategy(1)).toBe(100);
      expect(options.retryStrategy(2)).toBe(200);
      expect(options.retryStrategy(3)).toBe(300);
      expect(options.retryStrategy(4)).toBeNull();
    });
  });
});
