/**
 * Memory Monitor
 *
 * Polled between windows and between similarity batches. Utilization above the
 * configured fraction is a `ResourceExhaustion`, answered with a reclamation
 * pass; it never leaves the summarizer.
 */

import { getHeapStatistics } from 'node:v8';

import { SUMMARIZER_CONFIG } from '../config';
import { ResourceExhaustion } from '../errors';
import { err, ok, type Result } from '../result';
import { createPrefixedLogger, type Logger } from '../../utils/logger';

/**
 * Returns memory utilization as a fraction in [0, 1].
 */
export type MemoryProbe = () => number;

/**
 * Heap in use relative to the V8 heap limit.
 */
export const heapUtilization: MemoryProbe = () => {
  const { used_heap_size, heap_size_limit } = getHeapStatistics();
  return heap_size_limit > 0 ? used_heap_size / heap_size_limit : 0;
};

export interface MemoryMonitorOptions {
  /** Fraction above which memory is considered critical */
  readonly threshold?: number;
  readonly probe?: MemoryProbe;
  readonly logger?: Logger;
}

export class MemoryMonitor {
  readonly threshold: number;
  private readonly probe: MemoryProbe;
  private readonly log: Logger;
  private reclaimed = 0;

  constructor(options: MemoryMonitorOptions = {}) {
    this.threshold = options.threshold ?? SUMMARIZER_CONFIG.MEMORY_PRESSURE_FRACTION;
    this.probe = options.probe ?? heapUtilization;
    this.log = options.logger ?? createPrefixedLogger('[MemoryMonitor]');
  }

  /**
   * Current utilization, or `ResourceExhaustion` when it exceeds the threshold.
   */
  check(): Result<number, ResourceExhaustion> {
    const utilization = this.probe();
    return utilization > this.threshold ? err(new ResourceExhaustion(utilization, this.threshold)) : ok(utilization);
  }

  /**
   * Runs a reclamation pass: a forced collection when the runtime exposes
   * one (`--expose-gc`), then a yield to the event loop.
   */
  async reclaim(): Promise<void> {
    this.reclaimed++;
    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc === 'function') gc();
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  /**
   * Reclaims if memory is critical.
   *
   * @returns true when a reclamation pass ran
   */
  async relieve(): Promise<boolean> {
    const status = this.check();
    if (status.success) return false;
    this.log.warn(`${status.error.message}; reclaiming`);
    await this.reclaim();
    return true;
  }

  /** Reclamation passes run so far */
  get reclaimCount(): number {
    return this.reclaimed;
  }
}
