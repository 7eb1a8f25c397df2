/**
 * Contribution Service
 *
 * Wires the contribution core together and maps host lifecycle hooks
 * (setup, reconfigure, unload, remove) onto it:
 * - Measurement adapter and sensor source (Home Assistant)
 * - Privacy/depth controller
 * - Registration manager (TLS/TMS)
 * - Contribution scheduler
 * - Update coordinator (diagnostic snapshot)
 */

import { config, buildContributionOptions, validateContributionOptions } from '../../config/index.js';
import { getRedis } from '../../db/redis.js';
import { createLogger } from '../../utils/logger.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { HomeAssistantClient, assertRealHome } from '../sensors/home-assistant.js';
import type { HomeLocationSource, SensorSource } from '../sensors/home-assistant.js';
import { HttpServiceClient } from '../network/service-client.js';
import type { MeasurementServiceClient } from '../network/service-client.js';
import { DepthController } from './depth-controller.js';
import { RegistrationManager } from './registration-manager.js';
import {
  MemoryRegistrationStore,
  RedisRegistrationStore,
  type RegistrationStore,
} from './registration-store.js';
import { ContributionScheduler, selectedTypes } from './scheduler.js';
import { UpdateCoordinator } from './update-coordinator.js';
import type {
  ContributionOptions,
  HomeLocation,
  StatusSnapshot,
} from '../../types/contribution.js';

const logger = createLogger('contribution');

export { DepthController } from './depth-controller.js';
export { RegistrationManager } from './registration-manager.js';
export { ContributionScheduler } from './scheduler.js';
export { UpdateCoordinator } from './update-coordinator.js';
export { MemoryRegistrationStore, RedisRegistrationStore } from './registration-store.js';

export interface ContributionServiceDependencies {
  sensors: SensorSource;
  homeSource: HomeLocationSource;
  client: MeasurementServiceClient;
  store: RegistrationStore;
  /** Overrides the host's home coordinate */
  homeOverride?: HomeLocation;
  escalationThreshold?: number;
}

interface Core {
  registration: RegistrationManager;
  scheduler: ContributionScheduler;
}

/**
 * Host-facing facade of the contribution core.
 */
export class ContributionService {
  readonly coordinator: UpdateCoordinator;
  private core: Core | null = null;
  private options: ContributionOptions;

  constructor(
    private readonly deps: ContributionServiceDependencies,
    options: ContributionOptions
  ) {
    this.options = options;
    this.coordinator = new UpdateCoordinator(options.initialTrixelDepth);
  }

  get status(): StatusSnapshot {
    return this.coordinator.getSnapshot();
  }

  /**
   * Validate configuration, resolve the home location and start contributing.
   *
   * @throws ConfigurationError when the home location or options are invalid
   */
  async setup(): Promise<void> {
    try {
      this.options = validateContributionOptions(this.options);
      const home = await this.resolveHome();
      this.core = this.buildCore(home);
      this.coordinator.transition('running');
      this.core.scheduler.start();
      logger.info(
        { k: this.options.kRequirement, maxDepth: this.options.maxTrixelDepth },
        'Contribution service running'
      );
    } catch (error) {
      this.coordinator.transition('failed', errorMessage(error));
      if (error instanceof ConfigurationError) {
        logger.error({ error: error.message }, 'Contribution setup failed');
      }
      throw error;
    }
  }

  /**
   * Apply new options. Waits for the in-flight cycle and forces a fresh
   * registration on the next one.
   */
  async reconfigure(options: ContributionOptions): Promise<void> {
    const validated = validateContributionOptions(options);
    if (!this.core) {
      this.options = validated;
      return this.setup();
    }

    this.coordinator.transition('reconfiguring');
    try {
      const home = await this.resolveHome();
      await this.core.scheduler.reconfigure(validated, home);
      this.coordinator.recordRegistrationHealth(this.core.registration.health);
      this.options = validated;
      this.coordinator.transition('running');
      this.core.scheduler.start();
    } catch (error) {
      this.core.scheduler.stop();
      this.coordinator.transition('failed', errorMessage(error));
      logger.error({ error: errorMessage(error) }, 'Reconfiguration failed');
      throw error;
    }
  }

  /**
   * Stop contributing. An in-flight cycle's result is discarded.
   */
  unload(): void {
    this.core?.scheduler.stop();
    if (this.coordinator.lifecycle !== 'stopped') {
      this.coordinator.transition('stopped');
    }
  }

  /**
   * Unload and try to remove the station from the network.
   */
  async remove(): Promise<void> {
    this.unload();
    const registration =
      this.core?.registration ?? this.buildRegistration(this.deps.homeOverride ?? null);
    try {
      await registration.unregister();
      this.coordinator.recordRegistrationHealth(registration.health);
      logger.info('Removed measurement station gracefully');
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to gracefully remove measurement station');
    }
  }

  private async resolveHome(): Promise<HomeLocation> {
    if (this.deps.homeOverride) {
      return assertRealHome(this.deps.homeOverride);
    }
    return this.deps.homeSource.getHomeLocation();
  }

  private buildCore(home: HomeLocation): Core {
    const controller = new DepthController({
      maxDepth: this.options.maxTrixelDepth,
      kRequirement: this.options.kRequirement,
      initialDepth: this.options.initialTrixelDepth,
    });
    const registration = new RegistrationManager(this.deps.client, this.deps.store, controller, {
      home,
      kRequirement: this.options.kRequirement,
      measurementTypes: selectedTypes(this.options),
    });
    const scheduler = new ContributionScheduler(
      {
        sensors: this.deps.sensors,
        registration,
        controller,
        coordinator: this.coordinator,
        escalationThreshold: this.deps.escalationThreshold ?? config.FAILURE_ESCALATION_CYCLES,
      },
      this.options,
      home
    );
    return { registration, scheduler };
  }

  private buildRegistration(home: HomeLocation | null): RegistrationManager {
    return new RegistrationManager(
      this.deps.client,
      this.deps.store,
      new DepthController({
        maxDepth: this.options.maxTrixelDepth,
        kRequirement: this.options.kRequirement,
      }),
      {
        home: home ?? { latitude: 0, longitude: 0 },
        kRequirement: this.options.kRequirement,
        measurementTypes: selectedTypes(this.options),
      }
    );
  }
}

/**
 * Build the service from environment configuration.
 */
export function createContributionService(): ContributionService {
  const options = buildContributionOptions();
  const hass = new HomeAssistantClient();
  const redis = getRedis();

  const homeOverride =
    config.HOME_LATITUDE !== undefined && config.HOME_LONGITUDE !== undefined
      ? { latitude: config.HOME_LATITUDE, longitude: config.HOME_LONGITUDE }
      : undefined;

  return new ContributionService(
    {
      sensors: hass,
      homeSource: hass,
      client: new HttpServiceClient({
        tlsHost: options.tlsHost,
        tlsUseHttps: options.tlsUseHttps,
        tmsUseHttps: options.tmsUseHttps,
      }),
      store: redis ? new RedisRegistrationStore(redis, config.INSTANCE_ID) : new MemoryRegistrationStore(),
      homeOverride,
    },
    options
  );
}
