/**
 * Continuous axis shaping: physical axis value [-1, 1] -> output axis value [-1, 1].
 *
 * Order: deadzone -> direction filter -> saturation -> curve -> output cap -> invert.
 */

import type { AxisCurve, AxisIntensity, ContinuousMapping } from './types';
import { applyDeadzone, clamp, inverseLerp, lerp } from '../utils/math';

export function evaluateCurve(curve: AxisCurve, value: number): number {
  switch (curve.type) {
    case 'linear':
      return value;
    case 'exponential': {
      const sign = value < 0 ? -1 : 1;
      return sign * Math.pow(Math.abs(value), curve.exponent);
    }
    case 'points': {
      const points = curve.points;
      if (value <= points[0][0]) return points[0][1];
      for (let i = 1; i < points.length; i++) {
        const [x1, y1] = points[i];
        if (value <= x1) {
          const [x0, y0] = points[i - 1];
          return lerp(y0, y1, inverseLerp(x0, x1, value));
        }
      }
      return points[points.length - 1][1];
    }
  }
}

export function mapAxisValue(mapping: ContinuousMapping, raw: number): number {
  let value = applyDeadzone(clamp(raw, -1, 1), mapping.deadzone);

  if (mapping.direction === 'positive' && value < 0) value = 0;
  if (mapping.direction === 'negative' && value > 0) value = 0;

  value = clamp(value / mapping.saturation, -1, 1);
  value = clamp(evaluateCurve(mapping.curve, value), -1, 1);
  value *= mapping.maxOutput;

  if (mapping.invert) value = -value;
  // Avoid emitting -0 to sinks
  return value === 0 ? 0 : value;
}

/**
 * Intensity scale (0-1) for an axis-intensity binding.
 * Order: input ceiling -> direction filter -> saturation -> intensity cap -> floor.
 * Levels under the floor come back as 0.
 */
export function axisIntensityLevel(shaping: AxisIntensity, raw: number): number {
  const value = clamp(raw, -shaping.inputCeiling, shaping.inputCeiling);

  const magnitude =
    shaping.direction === 'positive'
      ? Math.max(value, 0)
      : shaping.direction === 'negative'
        ? Math.max(-value, 0)
        : Math.abs(value);

  const level = Math.min(magnitude / shaping.saturation, 1) * shaping.maxIntensity;
  return level < shaping.floor ? 0 : level;
}
