import { v4 as uuid } from 'uuid';
import { createLogger, type Logger } from '../../utils/logger.js';
import {
  ContributionError,
  InvalidDepthError,
  InvalidValueError,
  PrivacyViolationError,
  RejectedError,
  UnsupportedSensorError,
  errorMessage,
} from '../../utils/errors.js';
import { adapt, aggregate } from '../sensors/measurement-adapter.js';
import { locate, MAX_SUPPORTED_DEPTH } from '../trixel/locator.js';
import type { SensorSource } from '../sensors/home-assistant.js';
import type { DepthController } from './depth-controller.js';
import type { RegistrationManager } from './registration-manager.js';
import type { UpdateCoordinator } from './update-coordinator.js';
import {
  MEASUREMENT_TYPES,
  type AdaptedMeasurement,
  type ContributionOptions,
  type CycleOutcome,
  type HomeLocation,
  type MeasurementType,
  type TrixelId,
} from '../../types/contribution.js';

const logger = createLogger('scheduler');

export interface SchedulerDependencies {
  sensors: SensorSource;
  registration: RegistrationManager;
  controller: DepthController;
  coordinator: UpdateCoordinator;
  /** Failed cycles in a row before an error is escalated */
  escalationThreshold: number;
  locateTrixel?: (home: HomeLocation, depth: number) => TrixelId;
  now?: () => Date;
}

export type CycleResult = CycleOutcome | 'skipped' | 'discarded';

interface Collected {
  measurements: AdaptedMeasurement[];
  excluded: number;
}

/**
 * Contribution Scheduler
 *
 * Runs one contribution cycle per publish interval:
 * 1. Read and adapt every selected sensor (failures exclude the sensor)
 * 2. Skip submission when nothing is left to send
 * 3. Resolve the trixel at the depth fixed for this cycle
 * 4. Submit; a failed cycle is retried only by the next tick
 * 5. Refresh the diagnostic snapshot
 *
 * Cycles never overlap: a tick that fires while one is in flight is skipped.
 */
export class ContributionScheduler {
  private readonly locateTrixel: (home: HomeLocation, depth: number) => TrixelId;
  private readonly now: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleResult> | null = null;
  private generation = 0;
  private failureStreak = 0;
  private escalated = false;
  /** Last transmitted reading per entity (ms since epoch) */
  private readonly transmitted = new Map<string, number>();

  constructor(
    private readonly deps: SchedulerDependencies,
    private options: ContributionOptions,
    private home: HomeLocation
  ) {
    this.locateTrixel = deps.locateTrixel ?? locate;
    this.now = deps.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start ticking at the publish interval. The first cycle runs immediately.
   */
  start(): void {
    if (this.timer) {
      return;
    }
    const intervalMs = this.options.publishIntervalSeconds * 1000;
    this.timer = setInterval(() => this.tick(), intervalMs);
    logger.info({ intervalMs }, 'Contribution scheduler started');
    this.tick();
  }

  /**
   * Cancel the timer. An in-flight cycle may finish but its result is discarded.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.generation++;
    logger.info('Contribution scheduler stopped');
  }

  /**
   * Wait for the in-flight cycle, then swap configuration. The next cycle
   * starts from the initial depth with a fresh registration.
   */
  async reconfigure(options: ContributionOptions, home: HomeLocation = this.home): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }

    const wasRunning = this.running;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.options = options;
    this.home = home;
    this.transmitted.clear();
    this.failureStreak = 0;
    this.escalated = false;

    this.deps.controller.reconfigure({
      maxDepth: options.maxTrixelDepth,
      kRequirement: options.kRequirement,
      initialDepth: options.initialTrixelDepth,
    });
    this.deps.registration.reconfigure({
      home,
      kRequirement: options.kRequirement,
      measurementTypes: selectedTypes(options),
    });

    logger.info({ options }, 'Scheduler reconfigured');
    if (wasRunning) {
      this.start();
    }
  }

  /**
   * Timer callback.
   */
  tick(): void {
    this.runCycle().catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Contribution cycle crashed');
    });
  }

  /**
   * Run one cycle unless one is already in flight.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.inFlight) {
      logger.debug('Previous cycle still running, skipping tick');
      this.deps.coordinator.recordSkippedTick();
      return 'skipped';
    }

    const cycle = this.execute(this.generation);
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(generation: number): Promise<CycleResult> {
    const cycleLogger = logger.child({ cycleId: uuid() });
    const at = this.now();
    const { controller, registration, coordinator } = this.deps;

    // Pending directives take effect here and nowhere else
    const depth = controller.beginCycle();

    const { measurements, excluded } = await this.collect(cycleLogger);
    // A type is sent when any of its sensors reported since the last
    // transmission; its mean still covers every available sensor
    const freshTypes = new Set(
      measurements
        .filter((m) => this.transmitted.get(m.entityId) !== m.reportedAt.getTime())
        .map((m) => m.measurementType)
    );
    const sent = measurements.filter((m) => freshTypes.has(m.measurementType));
    const batch = aggregate(sent);

    if (generation !== this.generation) {
      return 'discarded';
    }

    if (batch.size === 0) {
      cycleLogger.debug({ excluded }, 'No data to contribute');
      coordinator.recordCycle({
        at,
        outcome: 'no_data',
        depth,
        trixelId: null,
        registrationHealth: registration.health,
        contributedTypes: [],
      });
      return 'no_data';
    }

    let trixelId: TrixelId;
    try {
      trixelId = this.locateTrixel(this.home, depth);
    } catch (error) {
      if (error instanceof InvalidDepthError) {
        const supported = Math.min(controller.maximumDepth, error.maxSupported, MAX_SUPPORTED_DEPTH);
        controller.receiveDirective(Math.min(Math.max(depth, 0), supported));
      }
      return this.fail(cycleLogger, at, depth, null, error);
    }

    let outcome: CycleOutcome;
    try {
      const result = await registration.submit(batch, trixelId, depth, at);
      if (generation !== this.generation) {
        return 'discarded';
      }

      if (!result.accepted) {
        const rejection = new RejectedError('Batch rejected by measurement service');
        return this.fail(cycleLogger, at, depth, trixelId, rejection);
      }

      for (const m of sent) {
        this.transmitted.set(m.entityId, m.reportedAt.getTime());
      }
      outcome = excluded > 0 ? 'partial' : 'success';
      cycleLogger.info(
        { trixelId, depth, types: [...batch.keys()], excluded, reregistered: result.reregistered },
        'Contribution accepted'
      );
    } catch (error) {
      if (generation !== this.generation) {
        return 'discarded';
      }
      return this.fail(cycleLogger, at, depth, trixelId, error);
    }

    this.failureStreak = 0;
    this.escalated = false;
    coordinator.recordCycle({
      at,
      outcome,
      depth,
      trixelId,
      registrationHealth: registration.health,
      contributedTypes: [...batch.keys()],
    });
    return outcome;
  }

  /**
   * Read and adapt all selected sensors. Failures exclude the sensor only.
   */
  private async collect(cycleLogger: Logger): Promise<Collected> {
    const measurements: AdaptedMeasurement[] = [];
    let excluded = 0;

    for (const type of MEASUREMENT_TYPES) {
      for (const entityId of this.options.sensorSelections[type]) {
        try {
          const state = await this.deps.sensors.readState(entityId);
          if (!state) {
            excluded++;
            continue;
          }
          measurements.push(adapt(state, type));
        } catch (error) {
          excluded++;
          if (error instanceof UnsupportedSensorError || error instanceof InvalidValueError) {
            cycleLogger.debug({ entityId, reason: error.message }, 'Sensor excluded');
          } else {
            cycleLogger.warn({ entityId, error: errorMessage(error) }, 'Sensor read failed');
          }
        }
      }
    }

    return { measurements, excluded };
  }

  private fail(
    cycleLogger: Logger,
    at: Date,
    depth: number,
    trixelId: TrixelId | null,
    error: unknown
  ): CycleOutcome {
    const { coordinator, registration, controller, escalationThreshold } = this.deps;
    const message = errorMessage(error);

    if (error instanceof PrivacyViolationError) {
      cycleLogger.info(
        { depth, retreatTo: controller.currentDepth },
        'Anonymity set too small, retreating'
      );
    } else {
      this.failureStreak++;
      const kind = error instanceof ContributionError ? error.kind : 'unknown';
      cycleLogger.warn({ kind, error: message, streak: this.failureStreak }, 'Contribution cycle failed');

      if (this.failureStreak >= escalationThreshold && !this.escalated) {
        this.escalated = true;
        cycleLogger.error(
          { streak: this.failureStreak, registrationHealth: registration.health },
          'Contributions keep failing'
        );
      }
    }

    coordinator.recordCycle({
      at,
      outcome: 'failed',
      error: message,
      errorKind: error instanceof ContributionError ? error.kind : undefined,
      depth,
      trixelId,
      registrationHealth: registration.health,
      contributedTypes: [],
    });
    return 'failed';
  }
}

/**
 * Measurement types with at least one selected sensor.
 */
export function selectedTypes(options: ContributionOptions): MeasurementType[] {
  return MEASUREMENT_TYPES.filter((type) => options.sensorSelections[type].length > 0);
}
