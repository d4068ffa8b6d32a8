/**
 * VirtualGamepadSink - AxisSink over an XInput-style virtual pad driver
 *
 * Sticks take -32768..32767 (Y inverted, as XInput counts up as positive),
 * triggers take 0..255 with -1 mapped to released and 1 to fully pulled.
 */

import type { AxisSink, SinkResult } from './types';
import type { GamepadAxisId } from '../../core/types';
import { clamp } from '../../utils/math';

/** Driver surface of the virtual gamepad */
export interface GamepadDriver {
  setLeftStick(x: number, y: number): void;
  setRightStick(x: number, y: number): void;
  setLeftTrigger(value: number): void;
  setRightTrigger(value: number): void;
  /** Push the report to the OS */
  update(): SinkResult;
  close?(): void | Promise<void>;
}

export const STICK_MAX = 32767;
export const TRIGGER_MAX = 255;

export function toStickValue(value: number): number {
  const scaled = Math.round(clamp(value, -1, 1) * STICK_MAX);
  return scaled === 0 ? 0 : scaled;
}

export function toTriggerValue(value: number): number {
  return clamp(Math.round(((clamp(value, -1, 1) + 1) / 2) * TRIGGER_MAX), 0, TRIGGER_MAX);
}

interface StickState {
  lx: number;
  ly: number;
  rx: number;
  ry: number;
}

export class VirtualGamepadSink implements AxisSink {
  private driver: GamepadDriver;
  private sticks: StickState = { lx: 0, ly: 0, rx: 0, ry: 0 };

  constructor(driver: GamepadDriver) {
    this.driver = driver;
  }

  sendAxis(axisId: GamepadAxisId, value: number): SinkResult {
    switch (axisId) {
      case 'left_stick_x':
        this.sticks.lx = toStickValue(value);
        this.driver.setLeftStick(this.sticks.lx, this.sticks.ly);
        break;
      case 'left_stick_y':
        this.sticks.ly = toStickValue(-value);
        this.driver.setLeftStick(this.sticks.lx, this.sticks.ly);
        break;
      case 'right_stick_x':
        this.sticks.rx = toStickValue(value);
        this.driver.setRightStick(this.sticks.rx, this.sticks.ry);
        break;
      case 'right_stick_y':
        this.sticks.ry = toStickValue(-value);
        this.driver.setRightStick(this.sticks.rx, this.sticks.ry);
        break;
      case 'left_trigger':
        this.driver.setLeftTrigger(toTriggerValue(value));
        break;
      case 'right_trigger':
        this.driver.setRightTrigger(toTriggerValue(value));
        break;
    }
    return this.driver.update();
  }

  /**
   * Center sticks and release triggers
   */
  stopAll(): SinkResult {
    this.sticks = { lx: 0, ly: 0, rx: 0, ry: 0 };
    this.driver.setLeftStick(0, 0);
    this.driver.setRightStick(0, 0);
    this.driver.setLeftTrigger(0);
    this.driver.setRightTrigger(0);
    return this.driver.update();
  }

  async close(): Promise<void> {
    await this.driver.close?.();
  }
}
