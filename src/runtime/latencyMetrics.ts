/**
 * Latency Metrics - Measures input receive -> dispatch latency
 *
 * One measurement per handled InputEvent, labelled by event kind.
 */

import { CircularBuffer } from '../utils/CircularBuffer';
import { bridgeLogger } from '../core/bridgeLogger';

/** Single latency measurement */
export interface LatencyMeasurement {
  label: string;
  recvTime: number;
  handledTime: number;
  latencyMs: number;
}

/** Latency statistics */
export interface LatencyStats {
  count: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
  lastMs: number;
}

const EMPTY_STATS: LatencyStats = { count: 0, minMs: 0, maxMs: 0, avgMs: 0, lastMs: 0 };

export class LatencyMetrics {
  private measurements: CircularBuffer<LatencyMeasurement>;

  constructor(maxMeasurements: number = 256) {
    this.measurements = new CircularBuffer(maxMeasurements);
  }

  /**
   * @returns recvTime to pass to record()
   */
  startTiming(): number {
    return performance.now();
  }

  record(label: string, recvTime: number, handledTime: number = performance.now()): LatencyMeasurement {
    const measurement: LatencyMeasurement = {
      label,
      recvTime,
      handledTime,
      latencyMs: handledTime - recvTime,
    };
    this.measurements.push(measurement);
    return measurement;
  }

  getStats(label?: string): LatencyStats {
    const all = this.measurements.toArray();
    const filtered = label === undefined ? all : all.filter((m) => m.label === label);
    if (filtered.length === 0) return { ...EMPTY_STATS };

    const latencies = filtered.map((m) => m.latencyMs);
    const sum = latencies.reduce((a, b) => a + b, 0);

    return {
      count: filtered.length,
      minMs: Math.min(...latencies),
      maxMs: Math.max(...latencies),
      avgMs: sum / filtered.length,
      lastMs: latencies[latencies.length - 1],
    };
  }

  clear(): void {
    this.measurements.clear();
  }

  logStats(): void {
    const stats = this.getStats();
    bridgeLogger.info(
      `[LatencyMetrics] count=${stats.count} min=${stats.minMs.toFixed(2)}ms max=${stats.maxMs.toFixed(2)}ms avg=${stats.avgMs.toFixed(2)}ms last=${stats.lastMs.toFixed(2)}ms`
    );
  }
}
