/**
 * TactsuitSink - VestSink over a tactsuit runtime
 *
 * The runtime takes whole 40-motor frames (0-100 per motor) rather than
 * single nodes, so every stimulus is expanded into a frame.
 */

import type { SinkResult, VestSink } from './types';
import { VEST_NODE_COUNT } from '../../core/types';
import { clamp01 } from '../../utils/math';

/** Vendor runtime surface the sink needs */
export interface HapticRuntime {
  playDot(position: number, durationMs: number, values: number[]): SinkResult;
  stopAll?(): SinkResult;
  close?(): void | Promise<void>;
}

export interface TactsuitSinkOptions {
  /** Device position id passed to playDot (0 = vest) */
  position?: number;
}

/**
 * Build a motor frame with `intensity` (0-1) on each listed node.
 * Out-of-range node ids are ignored.
 */
export function createFrame(nodes: readonly number[], intensity: number): number[] {
  const values = new Array<number>(VEST_NODE_COUNT).fill(0);
  const level = Math.round(clamp01(intensity) * 100);
  for (const node of nodes) {
    if (Number.isInteger(node) && node >= 0 && node < VEST_NODE_COUNT) {
      values[node] = level;
    }
  }
  return values;
}

export class TactsuitSink implements VestSink {
  private runtime: HapticRuntime;
  private position: number;

  constructor(runtime: HapticRuntime, options: TactsuitSinkOptions = {}) {
    this.runtime = runtime;
    this.position = options.position ?? 0;
  }

  sendStimulus(nodeId: number, intensity: number, durationMs: number): SinkResult {
    return this.runtime.playDot(this.position, Math.max(0, Math.round(durationMs)), createFrame([nodeId], intensity));
  }

  stopAll(): SinkResult {
    if (this.runtime.stopAll) return this.runtime.stopAll();
    return this.runtime.playDot(this.position, 0, createFrame([], 0));
  }

  async close(): Promise<void> {
    await this.runtime.close?.();
  }
}
