import { createLogger } from '../../utils/logger.js';
import {
  PrivacyViolationError,
  RegistrationExpiredError,
  errorMessage,
} from '../../utils/errors.js';
import { locate } from '../trixel/locator.js';
import type { DepthController } from './depth-controller.js';
import type { RegistrationStore } from './registration-store.js';
import type {
  MeasurementServiceClient,
  StationRegistration,
  SubmitResponse,
} from '../network/service-client.js';
import type {
  ClientRegistration,
  ContributionBatch,
  HomeLocation,
  MeasurementType,
  RegistrationHealth,
  SubmitResult,
  TrixelId,
} from '../../types/contribution.js';

const logger = createLogger('registration-manager');

/**
 * Depth of the coarse location hint sent when registering.
 */
const LOCATION_HINT_DEPTH = 0;

export interface RegistrationProfile {
  home: HomeLocation;
  kRequirement: number;
  measurementTypes: MeasurementType[];
}

/**
 * Registration Manager
 *
 * Owns the client's identity at the measurement service:
 * - Lazily registers (TLS lookup, then TMS registration) on first use
 * - Reuses a persisted registration across restarts when it still fits
 * - Re-registers once within a cycle when the TMS reports it unknown
 * - Forwards depth directives and privacy violations to the depth controller
 */
export class RegistrationManager {
  private cached: ClientRegistration | null = null;
  private storeChecked = false;
  private forceFresh = false;
  private healthState: RegistrationHealth = 'unregistered';

  constructor(
    private readonly client: MeasurementServiceClient,
    private readonly store: RegistrationStore,
    private readonly controller: DepthController,
    private profile: RegistrationProfile
  ) {}

  get health(): RegistrationHealth {
    return this.healthState;
  }

  get registration(): ClientRegistration | null {
    return this.cached;
  }

  /**
   * Swap the registration profile. The next cycle retires the old station
   * and registers afresh.
   */
  reconfigure(profile: RegistrationProfile): void {
    this.profile = profile;
    this.cached = null;
    this.storeChecked = false;
    this.forceFresh = true;
    this.healthState = 'unregistered';
  }

  /**
   * Drop the cached registration so the next call registers afresh.
   */
  invalidate(health: RegistrationHealth = 'unregistered'): void {
    this.cached = null;
    this.storeChecked = true;
    this.healthState = health;
  }

  /**
   * Return the live registration, registering when none is healthy.
   * Idempotent.
   */
  async ensureRegistered(): Promise<ClientRegistration> {
    if (this.cached) {
      return this.cached;
    }

    if (!this.storeChecked) {
      this.storeChecked = true;
      const forceFresh = this.forceFresh;
      this.forceFresh = false;
      const stored = await this.store.load();
      if (stored && !forceFresh && this.fitsProfile(stored)) {
        logger.info({ clientId: stored.clientId }, 'Reusing persisted registration');
        this.cached = stored;
        this.healthState = 'healthy';
        return stored;
      }
      if (stored) {
        logger.info({ clientId: stored.clientId, forceFresh }, 'Retiring persisted registration');
        await this.removeRemote(stored);
      }
    }

    return this.register();
  }

  /**
   * Submit a batch tagged with the current trixel.
   *
   * @throws NetworkError when the service cannot be reached
   * @throws RegistrationExpiredError when re-registration did not help
   * @throws PrivacyViolationError after the controller retreated
   */
  async submit(
    batch: ContributionBatch,
    trixelId: TrixelId,
    depth: number,
    timestamp: Date = new Date()
  ): Promise<SubmitResult> {
    let registration = await this.ensureRegistered();
    let response = await this.send(registration, batch, trixelId, depth, timestamp);
    let reregistered = false;

    if (response.error === 'registration_expired') {
      logger.info({ clientId: registration.clientId }, 'Registration expired, registering again');
      this.invalidate('expired');
      await this.forget();

      registration = await this.ensureRegistered();
      reregistered = true;
      response = await this.send(registration, batch, trixelId, depth, timestamp);

      if (response.error === 'registration_expired') {
        this.invalidate('expired');
        throw new RegistrationExpiredError('Registration rejected right after re-registering');
      }
    }

    if (response.error === 'privacy_violation') {
      this.controller.reportPrivacyViolation(depth);
      if (response.depthDirective !== undefined) {
        this.controller.receiveDirective(response.depthDirective);
      }
      throw new PrivacyViolationError(depth);
    }

    const accepted = response.accepted && response.error !== 'rejected';
    if (accepted) {
      registration.trixelId = trixelId;
      registration.depth = depth;
      registration.lastRenewedAt = timestamp;
      this.healthState = 'healthy';
      this.controller.confirm(depth);
    } else {
      logger.warn({ trixelId, detail: response.detail }, 'Batch rejected by measurement service');
    }

    if (response.depthDirective !== undefined) {
      logger.debug({ depthDirective: response.depthDirective }, 'Depth directive received');
      this.controller.receiveDirective(response.depthDirective);
    }

    return { accepted, depthDirective: response.depthDirective, reregistered };
  }

  /**
   * Remove the station from the TMS and forget it locally.
   */
  async unregister(): Promise<void> {
    const registration = this.cached ?? (await this.store.load());
    if (registration) {
      await this.client.unregister(registration.tmsHost, toStation(registration));
      logger.info({ clientId: registration.clientId }, 'Station removed from measurement service');
    }
    await this.forget();
    this.invalidate();
  }

  private async register(): Promise<ClientRegistration> {
    const { home, kRequirement, measurementTypes } = this.profile;
    const locationHint = locate(home, LOCATION_HINT_DEPTH);

    const tmsHost = await this.client.lookupTms(locationHint);
    const station = await this.client.register(tmsHost, {
      locationHint,
      kRequirement,
      measurementTypes,
    });

    const registration: ClientRegistration = {
      clientId: station.clientId,
      token: station.token,
      tmsHost,
      kRequirement,
      subscriptions: station.sensorIds,
      lastRenewedAt: new Date(),
    };

    this.cached = registration;
    this.healthState = 'healthy';
    await this.persist(registration);

    logger.info(
      { clientId: registration.clientId, tmsHost, subscriptions: registration.subscriptions },
      'Registered at measurement service'
    );
    return registration;
  }

  private async send(
    registration: ClientRegistration,
    batch: ContributionBatch,
    trixelId: TrixelId,
    depth: number,
    timestamp: Date
  ): Promise<SubmitResponse> {
    return this.client.submit(registration.tmsHost, toStation(registration), {
      trixelId,
      depth,
      timestamp,
      values: batch,
    });
  }

  private fitsProfile(registration: ClientRegistration): boolean {
    return (
      registration.kRequirement === this.profile.kRequirement &&
      this.profile.measurementTypes.every((type) => registration.subscriptions[type] !== undefined)
    );
  }

  private async removeRemote(registration: ClientRegistration): Promise<void> {
    try {
      await this.client.unregister(registration.tmsHost, toStation(registration));
    } catch (error) {
      logger.warn(
        { clientId: registration.clientId, error: errorMessage(error) },
        'Failed to remove outdated station'
      );
    }
    await this.forget();
  }

  /**
   * The live registration stays usable when it cannot be persisted; only
   * reuse after a restart is lost.
   */
  private async persist(registration: ClientRegistration): Promise<void> {
    try {
      await this.store.save(registration);
    } catch (error) {
      logger.warn(
        { clientId: registration.clientId, error: errorMessage(error) },
        'Failed to persist registration'
      );
    }
  }

  private async forget(): Promise<void> {
    try {
      await this.store.clear();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to clear persisted registration');
    }
  }
}

function toStation(registration: ClientRegistration): StationRegistration {
  return {
    clientId: registration.clientId,
    token: registration.token,
    sensorIds: registration.subscriptions,
  };
}
