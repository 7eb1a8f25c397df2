import { z } from 'zod';
import { config, derivedConfig } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { ConfigurationError, NetworkError, errorMessage } from '../../utils/errors.js';
import type { HomeLocation, SensorState } from '../../types/contribution.js';

const logger = createLogger('home-assistant');

/**
 * Entity state as returned by GET /api/states/<entity_id>.
 */
const entityStateSchema = z.object({
  entity_id: z.string(),
  state: z.string(),
  attributes: z
    .object({
      device_class: z.string().optional(),
      unit_of_measurement: z.string().optional(),
    })
    .passthrough()
    .default({}),
  last_updated: z.string(),
  last_reported: z.string().optional(),
});

/**
 * Subset of GET /api/config.
 */
const hostConfigSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export type EntityStatePayload = z.infer<typeof entityStateSchema>;

/**
 * Where the contribution core reads sensor states from.
 */
export interface SensorSource {
  /** Current state of an entity, or null when the host does not know it */
  readState(entityId: string): Promise<SensorState | null>;
}

/**
 * Where the home coordinate comes from.
 */
export interface HomeLocationSource {
  getHomeLocation(): Promise<HomeLocation>;
}

/**
 * Convert a host state payload into an adaptable sensor state.
 * Free-text states become numeric NaN and are rejected by the adapter.
 */
export function toSensorState(payload: EntityStatePayload): SensorState {
  const deviceClass = payload.attributes.device_class;
  const raw = payload.state.trim();

  if (derivedConfig.unavailableStates.includes(raw)) {
    return { kind: 'unavailable', entityId: payload.entity_id, deviceClass };
  }

  const lastReported = new Date(payload.last_reported ?? payload.last_updated);

  if (raw === 'on' || raw === 'off') {
    return {
      kind: 'binary',
      entityId: payload.entity_id,
      value: raw === 'on',
      deviceClass,
      lastReported,
    };
  }

  return {
    kind: 'numeric',
    entityId: payload.entity_id,
    value: raw === '' ? Number.NaN : Number(raw),
    unit: payload.attributes.unit_of_measurement,
    deviceClass,
    lastReported,
  };
}

/**
 * Reject the unset coordinate and the placeholder Home Assistant assigns
 * during onboarding.
 */
export function assertRealHome(location: HomeLocation): HomeLocation {
  const { latitude, longitude } = location;
  if (
    (!latitude && !longitude) ||
    (latitude === derivedConfig.onboardingHomeLatitude &&
      longitude === derivedConfig.onboardingHomeLongitude)
  ) {
    throw new ConfigurationError('Home location is not configured');
  }
  return location;
}

/**
 * Home Assistant REST API client.
 *
 * Reads entity states and the configured home coordinate using a
 * long-lived access token.
 */
export class HomeAssistantClient implements SensorSource, HomeLocationSource {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string = config.HASS_URL,
    private readonly token: string = config.HASS_TOKEN,
    private readonly timeoutMs: number = config.REQUEST_TIMEOUT_MS
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async readState(entityId: string): Promise<SensorState | null> {
    const response = await this.get(`/api/states/${encodeURIComponent(entityId)}`);

    if (response.status === 404) {
      logger.warn({ entityId }, 'Entity state could not be retrieved');
      return null;
    }

    const parsed = entityStateSchema.safeParse(await this.json(response));
    if (!parsed.success) {
      throw new NetworkError(`Malformed state for ${entityId}`, response.status, {
        cause: parsed.error,
      });
    }

    return toSensorState(parsed.data);
  }

  async getHomeLocation(): Promise<HomeLocation> {
    const response = await this.get('/api/config');
    const parsed = hostConfigSchema.safeParse(await this.json(response));
    if (!parsed.success) {
      throw new NetworkError('Malformed host configuration', response.status, {
        cause: parsed.error,
      });
    }

    return assertRealHome({
      latitude: parsed.data.latitude,
      longitude: parsed.data.longitude,
    });
  }

  private async get(path: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`Home Assistant request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.status === 401) {
      throw new ConfigurationError('Home Assistant rejected the access token');
    }
    if (!response.ok && response.status !== 404) {
      throw new NetworkError(
        `Home Assistant error: ${response.status} ${response.statusText}`,
        response.status
      );
    }
    return response;
  }

  private async json(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new NetworkError('Home Assistant returned invalid JSON', response.status, {
        cause: error,
      });
    }
  }
}
