import { z } from 'zod';
import { RedisKeys } from '../../db/redis.js';
import { createLogger } from '../../utils/logger.js';
import type { ClientRegistration } from '../../types/contribution.js';

const logger = createLogger('registration-store');

const persistedRegistrationSchema = z.object({
  clientId: z.string().min(1),
  token: z.string().min(1),
  tmsHost: z.string().min(1),
  kRequirement: z.number().int().min(1),
  subscriptions: z
    .object({
      ambient_temperature: z.number().int(),
      relative_humidity: z.number().int(),
    })
    .partial(),
  trixelId: z.number().int().optional(),
  depth: z.number().int().optional(),
  lastRenewedAt: z.string().datetime().transform((s) => new Date(s)),
});

/**
 * Where the registration survives restarts.
 */
export interface RegistrationStore {
  load(): Promise<ClientRegistration | null>;
  save(registration: ClientRegistration): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Subset of the Redis client the store needs.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

/**
 * Process-local store used when Redis is not configured.
 */
export class MemoryRegistrationStore implements RegistrationStore {
  private value: ClientRegistration | null = null;

  async load(): Promise<ClientRegistration | null> {
    return this.value ? { ...this.value } : null;
  }

  async save(registration: ClientRegistration): Promise<void> {
    this.value = { ...registration };
  }

  async clear(): Promise<void> {
    this.value = null;
  }
}

/**
 * Redis-backed store keyed by instance id.
 */
export class RedisRegistrationStore implements RegistrationStore {
  private readonly key: string;

  constructor(
    private readonly redis: KeyValueClient,
    instanceId: string
  ) {
    this.key = RedisKeys.registration(instanceId);
  }

  async load(): Promise<ClientRegistration | null> {
    const raw = await this.redis.get(this.key);
    if (!raw) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ key: this.key, error }, 'Discarding unreadable registration');
      return null;
    }

    const parsed = persistedRegistrationSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ key: this.key, issues: parsed.error.issues }, 'Discarding invalid registration');
      return null;
    }
    return parsed.data;
  }

  async save(registration: ClientRegistration): Promise<void> {
    await this.redis.set(
      this.key,
      JSON.stringify({ ...registration, lastRenewedAt: registration.lastRenewedAt.toISOString() })
    );
  }

  async clear(): Promise<void> {
    await this.redis.del(this.key);
  }
}
