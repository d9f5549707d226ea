import request from 'supertest';
import { resetMetrics } from '../../src/observability';
import { createTestApp, authenticatedRequest } from '../helpers';

describe('Observability E2E Tests', () => {
  const { app } = createTestApp();

  beforeEach(() => {
    // Reset metrics before each test to ensure clean state
    resetMetrics();
  });

  describe('GET /metrics', () => {
    it('should return Prometheus format metrics', async () => {
      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
    });

    it('should include HTTP request metrics with normalized paths', async () => {
      await request(app).get('/requests/next-id');

      const response = await request(app).get('/metrics');

      expect(response.text).toContain(
        'http_requests_total{method="GET",path="/requests/next-id",status="200",service="request-ledger"} 1'
      );
    });

    it('should count ledger operations by outcome', async () => {
      await authenticatedRequest(app, 'alice').post('/requests').send({ payer: 'bob', amount: 0 });

      const response = await request(app).get('/metrics');

      expect(response.text).toContain(
        'ledger_operations_total{operation="create",outcome="INVALID_AMOUNT",service="request-ledger"} 1'
      );
    });
  });

  describe('Correlation IDs', () => {
    it('should echo a provided correlation id', async () => {
      const response = await request(app).get('/health/live').set('X-Correlation-ID', 'corr-123');

      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });

    it('should generate a correlation id when none is provided', async () => {
      const response = await request(app).get('/health/live');

      expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});
