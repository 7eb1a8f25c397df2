import { createLogger } from '../../utils/logger.js';

const logger = createLogger('depth-controller');

export type DepthState = 'initial' | 'stable' | 'transitioning';

export interface DepthControllerOptions {
  maxDepth: number;
  kRequirement: number;
  initialDepth?: number;
}

/**
 * Privacy/Depth Controller
 *
 * Holds the trixel depth the client may currently report at. Server
 * directives are queued and only take effect at the start of the next
 * cycle, so one cycle never mixes depths.
 *
 * Rules:
 * - Depth is always within [0, maxDepth]; larger directives are clamped
 * - A privacy violation at depth d retreats to the deepest depth below d
 *   known to satisfy K (or d - 1), and the depth cannot grow again until
 *   the server accepts a submission at the retreated depth
 */
export class DepthController {
  private maxDepth: number;
  private kRequirement: number;

  private depth: number;
  private state: DepthState = 'initial';
  private pending: number[] = [];
  private readonly safeDepths = new Set<number>();
  private ceiling: number | null = null;

  constructor(options: DepthControllerOptions) {
    this.maxDepth = options.maxDepth;
    this.kRequirement = options.kRequirement;
    this.depth = this.clamp(options.initialDepth ?? 0);
  }

  get currentDepth(): number {
    return this.depth;
  }

  get currentState(): DepthState {
    return this.state;
  }

  get k(): number {
    return this.kRequirement;
  }

  get maximumDepth(): number {
    return this.maxDepth;
  }

  /**
   * Depth ceiling imposed by the last privacy retreat, if still in force.
   */
  get retreatCeiling(): number | null {
    return this.ceiling;
  }

  /**
   * Queue a server depth directive. Applied by the next beginCycle().
   */
  receiveDirective(targetDepth: number): void {
    if (!Number.isInteger(targetDepth)) {
      logger.warn({ targetDepth }, 'Ignoring non-integer depth directive');
      return;
    }

    const clamped = this.clamp(targetDepth);
    if (clamped !== targetDepth) {
      logger.info(
        { requested: targetDepth, clamped, maxDepth: this.maxDepth },
        'Depth directive clamped'
      );
    }

    this.pending.push(clamped);
    const effective = this.resolvePending();
    if (effective !== this.depth) {
      this.state = 'transitioning';
    }
  }

  /**
   * Apply queued directives and return the single depth for this cycle.
   */
  beginCycle(): number {
    if (this.pending.length === 0) {
      return this.depth;
    }

    const next = this.resolvePending();
    this.pending = [];

    if (next !== this.depth) {
      logger.info({ from: this.depth, to: next }, 'Adopting new trixel depth');
      this.depth = next;
    }
    if (this.state === 'transitioning') {
      this.state = 'stable';
    }
    return this.depth;
  }

  /**
   * Server accepted a submission made at `depth`.
   */
  confirm(depth: number): void {
    this.safeDepths.add(depth);
    if (depth !== this.depth) {
      return;
    }
    this.ceiling = null;
    if (this.state === 'initial') {
      this.state = 'stable';
    }
  }

  /**
   * Server reported an insufficient anonymity set at `depth`.
   */
  reportPrivacyViolation(depth: number): number {
    // Anything at or below the violated trixel is unsafe too
    for (const d of [...this.safeDepths]) {
      if (d >= depth) {
        this.safeDepths.delete(d);
      }
    }

    const knownSafe = [...this.safeDepths];
    const target = knownSafe.length > 0 ? Math.max(...knownSafe) : Math.max(depth - 1, 0);

    this.pending = [];
    this.ceiling = target;
    this.depth = target;
    this.state = 'initial';

    logger.info({ violatedDepth: depth, retreatTo: target, k: this.kRequirement }, 'Privacy retreat');
    return target;
  }

  /**
   * Reset with new limits after a host reconfiguration.
   */
  reconfigure(options: DepthControllerOptions): void {
    this.maxDepth = options.maxDepth;
    this.kRequirement = options.kRequirement;
    this.depth = this.clamp(options.initialDepth ?? 0);
    this.state = 'initial';
    this.pending = [];
    this.safeDepths.clear();
    this.ceiling = null;
  }

  private resolvePending(): number {
    const last = this.pending[this.pending.length - 1];
    if (last === undefined) {
      return this.depth;
    }
    return this.ceiling !== null ? Math.min(last, this.ceiling) : last;
  }

  private clamp(depth: number): number {
    return Math.min(Math.max(depth, 0), this.maxDepth);
  }
}
