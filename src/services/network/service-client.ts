import { z } from 'zod';
import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { NetworkError, errorMessage } from '../../utils/errors.js';
import {
  MEASUREMENT_TYPES,
  type BatchEntry,
  type MeasurementType,
  type TrixelId,
} from '../../types/contribution.js';

const logger = createLogger('service-client');

const measurementTypeSchema = z.enum(['ambient_temperature', 'relative_humidity']);

const tmsLookupSchema = z.object({
  host: z.string().min(1),
});

const registrationResponseSchema = z.object({
  uuid: z.string().min(1),
  token: z.string().min(1),
  sensors: z.array(
    z.object({
      measurement_type: measurementTypeSchema,
      sensor_id: z.number().int().nonnegative(),
    })
  ),
});

const submitResponseSchema = z.object({
  accepted: z.boolean(),
  depth_directive: z.number().int().optional(),
  error: z.enum(['registration_expired', 'rejected', 'privacy_violation']).optional(),
  detail: z.string().optional(),
});

/**
 * Credentials and subscriptions the TMS issued for this client.
 */
export interface StationRegistration {
  clientId: string;
  token: string;
  sensorIds: Partial<Record<MeasurementType, number>>;
}

export interface RegisterRequest {
  /** Coarse trixel the station lives in */
  locationHint: TrixelId;
  kRequirement: number;
  measurementTypes: MeasurementType[];
}

export type SubmitErrorCode = 'registration_expired' | 'rejected' | 'privacy_violation';

export interface SubmitResponse {
  accepted: boolean;
  depthDirective?: number;
  error?: SubmitErrorCode;
  detail?: string;
}

export interface SubmitRequest {
  trixelId: TrixelId;
  depth: number;
  timestamp: Date;
  values: ReadonlyMap<MeasurementType, BatchEntry>;
}

/**
 * Lookup/measurement service pair as seen by the contribution core.
 *
 * Implementations translate every transport failure into a NetworkError.
 */
export interface MeasurementServiceClient {
  lookupTms(trixelId: TrixelId): Promise<string>;
  register(tmsHost: string, request: RegisterRequest): Promise<StationRegistration>;
  submit(
    tmsHost: string,
    registration: StationRegistration,
    request: SubmitRequest
  ): Promise<SubmitResponse>;
  unregister(tmsHost: string, registration: StationRegistration): Promise<void>;
}

interface HttpServiceClientOptions {
  tlsHost: string;
  tlsUseHttps: boolean;
  tmsUseHttps: boolean;
  timeoutMs?: number;
}

/**
 * fetch-based client for the Trixel Lookup Service and Trixel Measurement Service.
 */
export class HttpServiceClient implements MeasurementServiceClient {
  private readonly tlsBaseUrl: string;
  private readonly tmsScheme: string;
  private readonly timeoutMs: number;

  constructor(options: HttpServiceClientOptions) {
    this.tlsBaseUrl = `${options.tlsUseHttps ? 'https' : 'http'}://${options.tlsHost}`;
    this.tmsScheme = options.tmsUseHttps ? 'https' : 'http';
    this.timeoutMs = options.timeoutMs ?? config.REQUEST_TIMEOUT_MS;
  }

  /**
   * Ask the TLS which TMS is responsible for a trixel.
   */
  async lookupTms(trixelId: TrixelId): Promise<string> {
    const response = await this.request(
      `${this.tlsBaseUrl}/TMS/which?trixel_id=${trixelId}`,
      { method: 'GET' }
    );
    this.assertOk(response, 'TMS lookup');
    const body = await this.parse(response, tmsLookupSchema, 'TMS lookup');
    logger.debug({ trixelId, tmsHost: body.host }, 'Resolved responsible TMS');
    return body.host;
  }

  async register(tmsHost: string, request: RegisterRequest): Promise<StationRegistration> {
    const response = await this.request(`${this.tmsUrl(tmsHost)}/measurement_station`, {
      method: 'POST',
      body: JSON.stringify({
        k_requirement: request.kRequirement,
        location_hint: request.locationHint,
        measurement_types: request.measurementTypes,
      }),
    });
    this.assertOk(response, 'Registration');
    const body = await this.parse(response, registrationResponseSchema, 'Registration');

    const sensorIds: Partial<Record<MeasurementType, number>> = {};
    for (const sensor of body.sensors) {
      sensorIds[sensor.measurement_type] = sensor.sensor_id;
    }
    return { clientId: body.uuid, token: body.token, sensorIds };
  }

  async submit(
    tmsHost: string,
    registration: StationRegistration,
    request: SubmitRequest
  ): Promise<SubmitResponse> {
    const measurements = MEASUREMENT_TYPES.flatMap((type) => {
      const entry = request.values.get(type);
      const sensorId = registration.sensorIds[type];
      if (!entry || sensorId === undefined) {
        return [];
      }
      return [
        {
          sensor_id: sensorId,
          measurement_type: type,
          value: entry.value,
          unit: entry.unit,
          timestamp: Math.round(request.timestamp.getTime() / 1000),
        },
      ];
    });

    const response = await this.request(`${this.tmsUrl(tmsHost)}/measurement/update`, {
      method: 'PUT',
      headers: { token: registration.token },
      body: JSON.stringify({
        client_id: registration.clientId,
        trixel_id: request.trixelId,
        depth: request.depth,
        measurements,
      }),
    });

    if (response.status === 401 || response.status === 404) {
      return { accepted: false, error: 'registration_expired' };
    }
    if (response.status >= 500) {
      throw new NetworkError(
        `Measurement submission failed: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    const body = await this.parse(response, submitResponseSchema, 'Measurement submission');
    return {
      accepted: body.accepted,
      depthDirective: body.depth_directive,
      error: body.error ?? (body.accepted || response.ok ? undefined : 'rejected'),
      detail: body.detail,
    };
  }

  async unregister(tmsHost: string, registration: StationRegistration): Promise<void> {
    const response = await this.request(`${this.tmsUrl(tmsHost)}/measurement_station`, {
      method: 'DELETE',
      headers: { token: registration.token },
    });
    // Already gone counts as removed
    if (response.status === 401 || response.status === 404) {
      return;
    }
    this.assertOk(response, 'Unregistration');
  }

  private tmsUrl(host: string): string {
    return `${this.tmsScheme}://${host}`;
  }

  private async request(
    url: string,
    init: { method: string; body?: string; headers?: Record<string, string> }
  ): Promise<Response> {
    try {
      return await fetch(url, {
        method: init.method,
        body: init.body,
        headers: { 'Content-Type': 'application/json', ...init.headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.debug({ url, error: errorMessage(error) }, 'Request failed');
      throw new NetworkError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }

  private assertOk(response: Response, what: string): void {
    if (!response.ok) {
      throw new NetworkError(
        `${what} failed: ${response.status} ${response.statusText}`,
        response.status
      );
    }
  }

  private async parse<T>(response: Response, schema: z.ZodType<T>, what: string): Promise<T> {
    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw new NetworkError(`${what} returned invalid JSON`, response.status, { cause: error });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new NetworkError(`${what} returned an unexpected body`, response.status, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
