import type { MetricVariable } from "../types/index.js";

/**
 * Read-only view over the host's performance monitors.
 * Polled on demand, possibly several times per frame; implementations must
 * not have side effects.
 */
export interface MetricSource {
  readonly currentFps: number;
  readonly minFps: number;
  readonly maxFps: number;
  readonly averageFps: number;
  /** MB */
  readonly allocatedMemory: number;
  /** MB */
  readonly reservedMemory: number;
  /** MB */
  readonly managedMemory: number;
  /** dB */
  readonly audioPeakDb: number;
}

export type MetricAccessor = (source: MetricSource) => number;

export type MetricAccessorTable = Record<MetricVariable, MetricAccessor>;

export const DEFAULT_ACCESSORS: Readonly<MetricAccessorTable> = {
  fps: (s) => s.currentFps,
  fps_min: (s) => s.minFps,
  fps_max: (s) => s.maxFps,
  fps_avg: (s) => s.averageFps,
  ram_allocated: (s) => s.allocatedMemory,
  ram_reserved: (s) => s.reservedMemory,
  ram_managed: (s) => s.managedMemory,
  audio_db: (s) => s.audioPeakDb,
};

/** Reading used for variables that have no accessor. */
export const UNKNOWN_METRIC_VALUE = 0;

/**
 * Resolves metric variables to readings.
 *
 * Variables arriving from untyped input (JSON definitions, scripting layers)
 * may name something with no accessor. Those read as UNKNOWN_METRIC_VALUE and
 * are reported through `onUnknown` rather than thrown, so a bad condition
 * never aborts a sweep.
 */
export class MetricResolver {
  private accessors: Map<string, MetricAccessor>;

  constructor(
    overrides: Partial<MetricAccessorTable> = {},
    private readonly onUnknown?: (variable: string) => void,
  ) {
    this.accessors = new Map<string, MetricAccessor>(Object.entries(DEFAULT_ACCESSORS));
    for (const [variable, accessor] of Object.entries(overrides)) {
      if (accessor) this.accessors.set(variable, accessor);
    }
  }

  read(variable: string, source: MetricSource): number {
    const accessor = this.accessors.get(variable);
    if (!accessor) {
      this.onUnknown?.(variable);
      return UNKNOWN_METRIC_VALUE;
    }
    return accessor(source);
  }

  has(variable: string): boolean {
    return this.accessors.has(variable);
  }
}

/**
 * Settable MetricSource for hosts that push readings into the engine
 * instead of exposing live monitors.
 */
export class SnapshotMetricSource implements MetricSource {
  currentFps = 0;
  minFps = 0;
  maxFps = 0;
  averageFps = 0;
  allocatedMemory = 0;
  reservedMemory = 0;
  managedMemory = 0;
  audioPeakDb = 0;

  constructor(initial: Partial<MetricSource> = {}) {
    this.update(initial);
  }

  update(values: Partial<MetricSource>): void {
    Object.assign(this, values);
  }
}
