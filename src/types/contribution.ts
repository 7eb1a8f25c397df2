/**
 * Measurement types the network accepts.
 * Values match the identifiers used by the measurement service.
 */
export type MeasurementType = 'ambient_temperature' | 'relative_humidity';

export const MEASUREMENT_TYPES: readonly MeasurementType[] = [
  'ambient_temperature',
  'relative_humidity',
] as const;

/**
 * Canonical unit per measurement type.
 */
export const CANONICAL_UNITS: Record<MeasurementType, string> = {
  ambient_temperature: '°C',
  relative_humidity: '%',
};

/**
 * Fixed home coordinate of the installation.
 */
export interface HomeLocation {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Trixel identifier in the hierarchical triangular mesh.
 */
export type TrixelId = number;

/**
 * Adaptable sensor state as read from the host.
 */
export type SensorState =
  | {
      kind: 'numeric';
      entityId: string;
      value: number;
      unit?: string;
      deviceClass?: string;
      lastReported: Date;
    }
  | {
      kind: 'binary';
      entityId: string;
      value: boolean;
      deviceClass?: string;
      lastReported: Date;
    }
  | {
      kind: 'unavailable';
      entityId: string;
      deviceClass?: string;
    };

/**
 * Single converted reading.
 */
export interface AdaptedMeasurement {
  entityId: string;
  measurementType: MeasurementType;
  value: number;
  unit: string;
  reportedAt: Date;
}

/**
 * Aggregated value of one measurement type within a batch.
 */
export interface BatchEntry {
  value: number;
  unit: string;
  sensorCount: number;
}

/**
 * One cycle's worth of aggregated readings. Never persisted.
 */
export type ContributionBatch = Map<MeasurementType, BatchEntry>;

/**
 * Host configuration consumed by the contribution core.
 */
export interface ContributionOptions {
  tlsHost: string;
  tlsUseHttps: boolean;
  tmsUseHttps: boolean;
  publishIntervalSeconds: number;
  kRequirement: number;
  maxTrixelDepth: number;
  initialTrixelDepth: number;
  sensorSelections: Record<MeasurementType, string[]>;
}

/**
 * Live registration with the measurement service.
 */
export interface ClientRegistration {
  clientId: string;
  token: string;
  tmsHost: string;
  kRequirement: number;
  /** Server-issued sensor id per subscribed measurement type */
  subscriptions: Partial<Record<MeasurementType, number>>;
  trixelId?: TrixelId;
  depth?: number;
  lastRenewedAt: Date;
}

/**
 * Registration health as shown on the diagnostic surface.
 */
export type RegistrationHealth = 'unregistered' | 'healthy' | 'expired';

/**
 * Result of submitting a batch.
 */
export interface SubmitResult {
  accepted: boolean;
  /** Depth the server asked the client to move to, if any */
  depthDirective?: number;
  /** True when the batch was only accepted after re-registering */
  reregistered: boolean;
}

/**
 * Outcome of a contribution cycle.
 */
export type CycleOutcome = 'success' | 'partial' | 'failed' | 'no_data';

/**
 * Lifecycle of the contribution service as driven by host hooks.
 */
export type LifecycleState =
  | 'created'
  | 'running'
  | 'reconfiguring'
  | 'stopped'
  | 'failed';

/**
 * Read-only diagnostic snapshot exposed to the host.
 */
export interface StatusSnapshot {
  lifecycle: LifecycleState;
  lastCycleAt: Date | null;
  lastOutcome: CycleOutcome | null;
  lastError: string | null;
  currentDepth: number;
  currentTrixelId: TrixelId | null;
  registrationHealth: RegistrationHealth;
  consecutiveFailures: number;
  skippedTicks: number;
  contributedTypes: MeasurementType[];
}
