/**
 * Device Sink Types - output boundary of the dispatch engine
 *
 * Vendor wire protocols live behind these interfaces. Sends are
 * fire-and-forget; the only feedback is a success flag (sync or async).
 */

import type { GamepadAxisId } from '../../core/types';

/** true = delivered, false = device unreachable */
export type SinkResult = boolean | Promise<boolean>;

/** Haptic vest output */
export interface VestSink {
  /**
   * Drive one node. Intensity 0 stops the node.
   */
  sendStimulus(nodeId: number, intensity: number, durationMs: number): SinkResult;

  /** Stop every node, if the runtime supports it */
  stopAll?(): SinkResult;

  /** Release the connection */
  close?(): void | Promise<void>;
}

/** Virtual gamepad output read by the motion chair app */
export interface AxisSink {
  /**
   * Set one output axis. Re-sending the same value is allowed (keep-alive).
   */
  sendAxis(axisId: GamepadAxisId, value: number): SinkResult;

  /** Return every axis to neutral */
  stopAll?(): SinkResult;

  close?(): void | Promise<void>;
}
