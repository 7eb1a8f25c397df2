/**
 * Unit tests for the diagnostic API routes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { statusRoutes } from '../../api/v1/status.js';
import type { StatusSnapshot } from '../../types/contribution.js';

function createSnapshot(overrides: Partial<StatusSnapshot> = {}): StatusSnapshot {
  return {
    lifecycle: 'running',
    lastCycleAt: new Date('2026-03-01T12:00:00Z'),
    lastOutcome: 'success',
    lastError: null,
    currentDepth: 1,
    currentTrixelId: 63,
    registrationHealth: 'healthy',
    consecutiveFailures: 0,
    skippedTicks: 0,
    contributedTypes: ['ambient_temperature'],
    ...overrides,
  };
}

describe('statusRoutes', () => {
  let app: FastifyInstance;
  let snapshot: StatusSnapshot;

  beforeEach(async () => {
    snapshot = createSnapshot();
    app = Fastify();
    await app.register(statusRoutes, {
      prefix: '/api/v1/status',
      service: {
        get status() {
          return snapshot;
        },
      },
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should return the diagnostic snapshot', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/status' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      lifecycle: 'running',
      lastCycleAt: '2026-03-01T12:00:00.000Z',
      lastOutcome: 'success',
      lastError: null,
      currentDepth: 1,
      currentTrixelId: 63,
      registrationHealth: 'healthy',
      consecutiveFailures: 0,
      skippedTicks: 0,
      contributedTypes: ['ambient_temperature'],
    });
  });

  it('should report healthy while contributing', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/status/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'healthy',
      checks: { lifecycle: 'running', registration: 'healthy', consecutiveFailures: 0 },
    });
  });

  it('should report unhealthy with an expired registration', async () => {
    snapshot = createSnapshot({ registrationHealth: 'expired', consecutiveFailures: 4 });

    const response = await app.inject({ method: 'GET', url: '/api/v1/status/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'unhealthy' });
  });

  it('should report unhealthy once stopped', async () => {
    snapshot = createSnapshot({ lifecycle: 'stopped' });

    const response = await app.inject({ method: 'GET', url: '/api/v1/status/health' });

    expect(response.statusCode).toBe(503);
  });
});
