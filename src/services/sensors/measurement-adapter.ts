import { InvalidValueError, UnsupportedSensorError } from '../../utils/errors.js';
import {
  CANONICAL_UNITS,
  MEASUREMENT_TYPES,
  type AdaptedMeasurement,
  type ContributionBatch,
  type MeasurementType,
  type SensorState,
} from '../../types/contribution.js';

/**
 * Host device class expected for each measurement type.
 */
export const DEVICE_CLASS_BY_TYPE: Record<MeasurementType, string> = {
  ambient_temperature: 'temperature',
  relative_humidity: 'humidity',
};

/**
 * Converters from a host unit into the canonical unit, per measurement type.
 */
const UNIT_CONVERTERS: Record<MeasurementType, Record<string, (value: number) => number>> = {
  ambient_temperature: {
    '°C': (c) => c,
    '°F': (f) => ((f - 32) * 5) / 9,
    K: (k) => k - 273.15,
  },
  relative_humidity: {
    '%': (h) => h,
  },
};

/**
 * Measurement type a host device class maps to, if any.
 */
export function measurementTypeFor(deviceClass: string | undefined): MeasurementType | undefined {
  return MEASUREMENT_TYPES.find((type) => DEVICE_CLASS_BY_TYPE[type] === deviceClass);
}

/**
 * Convert a host sensor state into a canonical network measurement.
 *
 * When `selectedAs` is given, the sensor's device class must match that
 * measurement type; otherwise the type is derived from the device class.
 *
 * @throws UnsupportedSensorError when the device class or unit has no mapping
 * @throws InvalidValueError when the state is unavailable or not a finite number
 */
export function adapt(state: SensorState, selectedAs?: MeasurementType): AdaptedMeasurement {
  // The host may drop attributes of unavailable entities, device class included
  if (state.kind === 'unavailable') {
    throw new InvalidValueError(state.entityId, 'Sensor is unavailable');
  }

  const derived = measurementTypeFor(state.deviceClass);
  if (!derived) {
    throw new UnsupportedSensorError(
      state.entityId,
      `Device class ${state.deviceClass ?? '<none>'} has no measurement type`
    );
  }
  if (selectedAs && selectedAs !== derived) {
    throw new UnsupportedSensorError(
      state.entityId,
      `Device class ${state.deviceClass ?? '<none>'} cannot contribute ${selectedAs}`
    );
  }

  switch (state.kind) {
    case 'binary':
      throw new InvalidValueError(state.entityId, 'Binary state is not a measurement');
    case 'numeric': {
      if (!Number.isFinite(state.value)) {
        throw new InvalidValueError(state.entityId, 'State is not numeric');
      }
      const unit = state.unit ?? CANONICAL_UNITS[derived];
      const convert = UNIT_CONVERTERS[derived][unit];
      if (!convert) {
        throw new UnsupportedSensorError(
          state.entityId,
          `Unit ${unit} not supported for ${derived}`
        );
      }
      return {
        entityId: state.entityId,
        measurementType: derived,
        value: convert(state.value),
        unit: CANONICAL_UNITS[derived],
        reportedAt: state.lastReported,
      };
    }
  }
}

/**
 * Arithmetic mean per measurement type. Types without readings are omitted.
 */
export function aggregate(measurements: readonly AdaptedMeasurement[]): ContributionBatch {
  const sums = new Map<MeasurementType, { total: number; count: number }>();
  for (const m of measurements) {
    const acc = sums.get(m.measurementType) ?? { total: 0, count: 0 };
    acc.total += m.value;
    acc.count += 1;
    sums.set(m.measurementType, acc);
  }

  const batch: ContributionBatch = new Map();
  for (const [type, { total, count }] of sums) {
    batch.set(type, { value: total / count, unit: CANONICAL_UNITS[type], sensorCount: count });
  }
  return batch;
}
