import type { LogicalInput } from './types';

/**
 * Canonical identity of a logical input, used as map key everywhere.
 * Joystick inputs without a deviceIndex belong to device 0.
 *
 * @example
 * inputKey({ kind: 'key', code: 'r' })                 // "key:R"
 * inputKey({ kind: 'joystick-axis', code: 1 })         // "joystick-axis:0:1"
 */
export function inputKey(input: LogicalInput): string {
  switch (input.kind) {
    case 'key':
      return `key:${input.code.toUpperCase()}`;
    case 'mouse-button':
      return `mouse-button:${input.code}`;
    case 'joystick-button':
    case 'joystick-axis':
      return `${input.kind}:${input.deviceIndex ?? 0}:${input.code}`;
  }
}

/**
 * Short human label for logs, e.g. "Key R" or "Joystick 1 axis 2".
 */
export function describeInput(input: LogicalInput): string {
  switch (input.kind) {
    case 'key':
      return `Key ${input.code.toUpperCase()}`;
    case 'mouse-button':
      return `Mouse ${input.code}`;
    case 'joystick-button':
      return `Joystick ${input.deviceIndex ?? 0} button ${input.code}`;
    case 'joystick-axis':
      return `Joystick ${input.deviceIndex ?? 0} axis ${input.code}`;
  }
}
