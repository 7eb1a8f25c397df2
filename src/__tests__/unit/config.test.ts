/**
 * Unit tests for configuration loading and option validation.
 */

import { describe, it, expect } from 'vitest';
import { testData } from '../setup.js';
import {
  buildContributionOptions,
  config,
  derivedConfig,
  validateContributionOptions,
} from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('config', () => {
  it('should parse the environment with defaults', () => {
    expect(config.HASS_TOKEN).toBe('test-secret');
    expect(config.TLS_USE_HTTPS).toBe(true);
    expect(config.PUBLISH_INTERVAL_SECONDS).toBe(60);
    expect(config.K_REQUIREMENT).toBe(3);
    expect(config.MAX_TRIXEL_DEPTH).toBe(24);
    expect(config.PORT).toBe(8088);
    expect(config.REDIS_URL).toBeUndefined();
  });

  it('should derive the host constants', () => {
    expect(derivedConfig).toEqual({
      onboardingHomeLatitude: 52.3731339,
      onboardingHomeLongitude: 4.8903147,
      unavailableStates: ['unavailable', 'unknown'],
    });
  });

  it('should split sensor lists', () => {
    expect(config.AMBIENT_TEMPERATURE_SENSORS).toEqual(['sensor.outdoor_temperature']);
    expect(config.RELATIVE_HUMIDITY_SENSORS).toEqual(['sensor.outdoor_humidity']);
  });
});

describe('buildContributionOptions', () => {
  it('should map the environment onto contribution options', () => {
    const options = buildContributionOptions({
      ...config,
      TLS_USE_HTTPS: false,
      K_REQUIREMENT: 5,
      MAX_TRIXEL_DEPTH: 12,
      INITIAL_TRIXEL_DEPTH: 2,
    });

    expect(options).toEqual({
      tlsHost: 'tls.test',
      tlsUseHttps: false,
      tmsUseHttps: true,
      publishIntervalSeconds: 60,
      kRequirement: 5,
      maxTrixelDepth: 12,
      initialTrixelDepth: 2,
      sensorSelections: {
        ambient_temperature: ['sensor.outdoor_temperature'],
        relative_humidity: ['sensor.outdoor_humidity'],
      },
    });
  });

  it('should refuse an initial depth beyond the maximum', () => {
    expect(() =>
      buildContributionOptions({ ...config, MAX_TRIXEL_DEPTH: 3, INITIAL_TRIXEL_DEPTH: 4 })
    ).toThrow(ConfigurationError);
  });
});

describe('validateContributionOptions', () => {
  it('should accept valid options', () => {
    const options = testData.createOptions();

    expect(validateContributionOptions(options)).toEqual(options);
  });

  it('should enforce the publish interval bounds', () => {
    expect(() =>
      validateContributionOptions(testData.createOptions({ publishIntervalSeconds: 901 }))
    ).toThrow(/^Invalid contribution options \(publishIntervalSeconds\)/);
  });

  it('should require K of at least one', () => {
    expect(() => validateContributionOptions(testData.createOptions({ kRequirement: 0 }))).toThrow(
      ConfigurationError
    );
  });

  it('should cap the maximum depth', () => {
    expect(() =>
      validateContributionOptions(testData.createOptions({ maxTrixelDepth: 25 }))
    ).toThrow(ConfigurationError);
  });

  it('should reject input that is not an options object', () => {
    expect(() => validateContributionOptions(null)).toThrow(ConfigurationError);
  });
});
