/**
 * Unit tests for the registration stores.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createMockRedis, createTestUuid } from '../setup.js';
import type { ClientRegistration } from '../../types/contribution.js';

// Mock the logger
vi.mock('../../utils/logger.js', () => {
  class StubLogger {
    debug = vi.fn();
    info = vi.fn();
    warn = vi.fn();
    error = vi.fn();
    child(): StubLogger {
      return this;
    }
  }
  const logger = new StubLogger();
  return { logger, createLogger: () => logger };
});

// Import after mocks are set up
import {
  MemoryRegistrationStore,
  RedisRegistrationStore,
} from '../../services/contribution/registration-store.js';

function createRegistration(overrides: Partial<ClientRegistration> = {}): ClientRegistration {
  return {
    clientId: createTestUuid(1),
    token: 'test-token',
    tmsHost: 'tms.test',
    kRequirement: 3,
    subscriptions: { ambient_temperature: 1 },
    lastRenewedAt: new Date('2026-03-01T12:00:00.000Z'),
    ...overrides,
  };
}

describe('RedisRegistrationStore', () => {
  let redis: ReturnType<typeof createMockRedis>;
  let store: RedisRegistrationStore;

  beforeEach(() => {
    redis = createMockRedis();
    store = new RedisRegistrationStore(redis, 'home');
  });

  it('should persist under the instance key', async () => {
    await store.save(createRegistration());

    expect(redis.set).toHaveBeenCalledTimes(1);
    const raw = redis._store.get('trixel:registration:home');
    expect(raw).toBeDefined();
    expect(JSON.parse(raw ?? '{}')).toEqual({
      clientId: createTestUuid(1),
      token: 'test-token',
      tmsHost: 'tms.test',
      kRequirement: 3,
      subscriptions: { ambient_temperature: 1 },
      lastRenewedAt: '2026-03-01T12:00:00.000Z',
    });
  });

  it('should load what it saved', async () => {
    const registration = createRegistration({ trixelId: 63, depth: 1 });
    await store.save(registration);

    await expect(store.load()).resolves.toEqual(registration);
  });

  it('should return null when nothing is stored', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('should discard unreadable entries', async () => {
    redis._store.set('trixel:registration:home', '{not json');

    await expect(store.load()).resolves.toBeNull();
  });

  it('should discard entries with missing fields', async () => {
    redis._store.set('trixel:registration:home', JSON.stringify({ clientId: 'x' }));

    await expect(store.load()).resolves.toBeNull();
  });

  it('should clear the entry', async () => {
    await store.save(createRegistration());
    await store.clear();

    expect(redis.del).toHaveBeenCalledWith('trixel:registration:home');
    await expect(store.load()).resolves.toBeNull();
  });
});

describe('MemoryRegistrationStore', () => {
  it('should round-trip and clear', async () => {
    const store = new MemoryRegistrationStore();
    const registration = createRegistration();

    await store.save(registration);
    await expect(store.load()).resolves.toEqual(registration);

    await store.clear();
    await expect(store.load()).resolves.toBeNull();
  });
});
