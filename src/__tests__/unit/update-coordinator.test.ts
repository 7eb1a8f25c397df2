/**
 * Unit tests for UpdateCoordinator.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { CycleReport } from '../../services/contribution/update-coordinator.js';

// Mock the logger
vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks are set up
import { UpdateCoordinator } from '../../services/contribution/update-coordinator.js';

function report(overrides: Partial<CycleReport> = {}): CycleReport {
  return {
    at: new Date('2026-03-01T12:00:00Z'),
    outcome: 'success',
    depth: 1,
    trixelId: 63,
    registrationHealth: 'healthy',
    contributedTypes: ['ambient_temperature'],
    ...overrides,
  };
}

describe('UpdateCoordinator', () => {
  let coordinator: UpdateCoordinator;

  beforeEach(() => {
    coordinator = new UpdateCoordinator(2);
  });

  it('should start in the created state', () => {
    expect(coordinator.getSnapshot()).toEqual({
      lifecycle: 'created',
      lastCycleAt: null,
      lastOutcome: null,
      lastError: null,
      currentDepth: 2,
      currentTrixelId: null,
      registrationHealth: 'unregistered',
      consecutiveFailures: 0,
      skippedTicks: 0,
      contributedTypes: [],
    });
  });

  describe('transition', () => {
    it('should follow the lifecycle table', () => {
      coordinator.transition('running');
      coordinator.transition('reconfiguring');
      coordinator.transition('running');
      coordinator.transition('stopped');

      expect(coordinator.lifecycle).toBe('stopped');
    });

    it('should reject illegal transitions', () => {
      coordinator.transition('stopped');

      expect(() => coordinator.transition('running')).toThrow(
        'Illegal lifecycle transition stopped -> running'
      );
    });

    it('should record the failure reason', () => {
      coordinator.transition('failed', 'Home location is not configured');

      expect(coordinator.getSnapshot().lastError).toBe('Home location is not configured');
    });

    it('should ignore a transition to the current state', () => {
      coordinator.transition('running');

      expect(() => coordinator.transition('running')).not.toThrow();
    });
  });

  describe('recordCycle', () => {
    it('should copy the cycle into the snapshot', () => {
      coordinator.recordCycle(report());

      const snapshot = coordinator.getSnapshot();
      expect(snapshot.lastOutcome).toBe('success');
      expect(snapshot.currentDepth).toBe(1);
      expect(snapshot.currentTrixelId).toBe(63);
      expect(snapshot.registrationHealth).toBe('healthy');
      expect(snapshot.contributedTypes).toEqual(['ambient_temperature']);
    });

    it('should count consecutive failures and reset on success', () => {
      coordinator.recordCycle(report({ outcome: 'failed', error: 'timeout' }));
      coordinator.recordCycle(report({ outcome: 'failed', error: 'timeout' }));
      expect(coordinator.getSnapshot().consecutiveFailures).toBe(2);
      expect(coordinator.getSnapshot().lastError).toBe('timeout');

      coordinator.recordCycle(report({ outcome: 'partial' }));
      expect(coordinator.getSnapshot().consecutiveFailures).toBe(0);
      expect(coordinator.getSnapshot().lastError).toBeNull();
    });

    it('should leave the failure count alone without data', () => {
      coordinator.recordCycle(report({ outcome: 'failed', error: 'timeout' }));
      coordinator.recordCycle(report({ outcome: 'no_data' }));

      expect(coordinator.getSnapshot().consecutiveFailures).toBe(1);
    });

    it('should not count a privacy violation as a failure', () => {
      coordinator.recordCycle(report({ outcome: 'failed', error: 'timeout', errorKind: 'network' }));
      coordinator.recordCycle(
        report({
          outcome: 'failed',
          error: 'Insufficient anonymity set at depth 1',
          errorKind: 'privacy_violation',
        })
      );

      expect(coordinator.getSnapshot().consecutiveFailures).toBe(1);
      expect(coordinator.getSnapshot().lastOutcome).toBe('failed');
    });
  });

  it('should count skipped ticks', () => {
    coordinator.recordSkippedTick();
    coordinator.recordSkippedTick();

    expect(coordinator.getSnapshot().skippedTicks).toBe(2);
  });

  it('should hand out copies', () => {
    coordinator.recordCycle(report());

    const snapshot = coordinator.getSnapshot();
    snapshot.contributedTypes.push('relative_humidity');

    expect(coordinator.getSnapshot().contributedTypes).toEqual(['ambient_temperature']);
  });

  it('should notify subscribers until they unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = coordinator.subscribe(listener);

    coordinator.recordSkippedTick();
    unsubscribe();
    coordinator.recordSkippedTick();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({ skippedTicks: 1 });
  });

  it('should keep notifying when a subscriber throws', () => {
    const healthy = vi.fn();
    coordinator.subscribe(() => {
      throw new Error('listener failed');
    });
    coordinator.subscribe(healthy);

    coordinator.recordRegistrationHealth('expired');

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(coordinator.getSnapshot().registrationHealth).toBe('expired');
  });
});
