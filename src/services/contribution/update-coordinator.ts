import { createLogger } from '../../utils/logger.js';
import type { ContributionErrorKind } from '../../utils/errors.js';
import type {
  CycleOutcome,
  LifecycleState,
  MeasurementType,
  RegistrationHealth,
  StatusSnapshot,
  TrixelId,
} from '../../types/contribution.js';

const logger = createLogger('update-coordinator');

/**
 * Allowed lifecycle transitions, driven by host setup/unload/reconfigure hooks.
 */
const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  created: ['running', 'failed', 'stopped'],
  running: ['reconfiguring', 'stopped'],
  reconfiguring: ['running', 'failed', 'stopped'],
  failed: ['running', 'reconfiguring', 'stopped'],
  stopped: [],
};

export interface CycleReport {
  at: Date;
  outcome: CycleOutcome;
  error?: string;
  errorKind?: ContributionErrorKind;
  depth: number;
  trixelId: TrixelId | null;
  registrationHealth: RegistrationHealth;
  contributedTypes: MeasurementType[];
}

type SnapshotListener = (snapshot: StatusSnapshot) => void;

/**
 * Update Coordinator
 *
 * Keeps the host-facing diagnostic snapshot. Written only by the scheduler
 * and the lifecycle hooks; readers receive copies.
 */
export class UpdateCoordinator {
  private snapshot: StatusSnapshot;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(initialDepth = 0) {
    this.snapshot = {
      lifecycle: 'created',
      lastCycleAt: null,
      lastOutcome: null,
      lastError: null,
      currentDepth: initialDepth,
      currentTrixelId: null,
      registrationHealth: 'unregistered',
      consecutiveFailures: 0,
      skippedTicks: 0,
      contributedTypes: [],
    };
  }

  getSnapshot(): StatusSnapshot {
    return { ...this.snapshot, contributedTypes: [...this.snapshot.contributedTypes] };
  }

  get lifecycle(): LifecycleState {
    return this.snapshot.lifecycle;
  }

  /**
   * Move to another lifecycle state.
   *
   * @throws Error on a transition the table does not allow
   */
  transition(to: LifecycleState, reason?: string): void {
    const from = this.snapshot.lifecycle;
    if (from === to) {
      return;
    }
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal lifecycle transition ${from} -> ${to}`);
    }

    this.update({ lifecycle: to, ...(reason ? { lastError: reason } : {}) });
    logger.info({ from, to, reason }, 'Lifecycle transition');
  }

  /**
   * Record the outcome of a contribution cycle.
   *
   * Privacy violations and cycles without data leave the failure count as
   * is; the depth retreat already handles a violation.
   */
  recordCycle(report: CycleReport): void {
    let consecutiveFailures = 0;
    if (report.outcome === 'no_data' || report.errorKind === 'privacy_violation') {
      consecutiveFailures = this.snapshot.consecutiveFailures;
    } else if (report.outcome === 'failed') {
      consecutiveFailures = this.snapshot.consecutiveFailures + 1;
    }

    this.update({
      lastCycleAt: report.at,
      lastOutcome: report.outcome,
      lastError: report.error ?? null,
      currentDepth: report.depth,
      currentTrixelId: report.trixelId,
      registrationHealth: report.registrationHealth,
      consecutiveFailures,
      contributedTypes: report.contributedTypes,
    });
  }

  recordSkippedTick(): void {
    this.update({ skippedTicks: this.snapshot.skippedTicks + 1 });
  }

  recordRegistrationHealth(health: RegistrationHealth): void {
    if (health !== this.snapshot.registrationHealth) {
      this.update({ registrationHealth: health });
    }
  }

  /**
   * Listen for snapshot changes. Returns an unsubscribe function.
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private update(patch: Partial<StatusSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    const copy = this.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(copy);
      } catch (error) {
        logger.warn({ error }, 'Snapshot listener failed');
      }
    }
  }
}
