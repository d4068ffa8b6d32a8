/**
 * Math helpers shared by preset validation, axis shaping and the sinks.
 */

/**
 * Clamp value to 0..1 range.
 */
export function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

/**
 * Clamp value to arbitrary range.
 */
export function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/**
 * Linear interpolation.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Inverse lerp - find t given value between a and b.
 */
export function inverseLerp(a: number, b: number, value: number): number {
  if (Math.abs(b - a) < 1e-10) return 0;
  return (value - a) / (b - a);
}

/**
 * Apply deadzone to value.
 * Values within deadzone are snapped to 0.
 */
export function applyDeadzone(value: number, deadzone: number): number {
  if (Math.abs(value) < deadzone) return 0;
  // Rescale remaining range
  const sign = value < 0 ? -1 : 1;
  return sign * ((Math.abs(value) - deadzone) / (1 - deadzone));
}
