import { performance } from 'node:perf_hooks';

export interface MetricsSnapshot<TPhase extends string = string> {
  /** Accumulated milliseconds per phase that ran at least once */
  phases: Partial<Record<TPhase, number>>;
  totalMs: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

/**
 * Wall-clock timers keyed by phase name. A disabled collector accepts every
 * call and records nothing.
 */
export class MetricsCollector<TPhase extends string = string> {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers = new Map<TPhase, TimerState>();

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
  }

  public begin(phase: TPhase): void {
    if (!this.enabled) {
      return;
    }
    const current = this.timers.get(phase) ?? { total: 0 };
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers.set(phase, { total: current.total, startedAt: this.now() });
  }

  public end(phase: TPhase): number {
    if (!this.enabled) {
      return 0;
    }
    const current = this.timers.get(phase);
    if (!current || !isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    const duration = safeDuration(this.now() - current.startedAt);
    this.timers.set(phase, { total: current.total + duration });
    return duration;
  }

  public snapshotMetrics(): MetricsSnapshot<TPhase> {
    const phases: Partial<Record<TPhase, number>> = {};
    let totalMs = 0;
    for (const [phase, state] of this.timers) {
      phases[phase] = state.total;
      totalMs += state.total;
    }
    return { phases, totalMs };
  }
}

function safeDuration(durationMs: number): number {
  return Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
