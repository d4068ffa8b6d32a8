/**
 * Raw device events -> LogicalInput
 *
 * Keyboard events may carry a key name ("r", "Space") or a Windows
 * virtual-key code; both resolve through keyTable.json. Virtual-key codes
 * of mouse buttons become mouse-button inputs.
 */

import keyTable from './keyTable.json';
import type { LogicalInput, MouseButtonCode } from '../core/types';
import { MOUSE_BUTTONS } from '../core/types';

// ============ Raw Events ============

export type RawInputEvent =
  | { source: 'keyboard'; key: string | number; down: boolean }
  | { source: 'mouse'; button: 'left' | 'right' | 'middle' | MouseButtonCode; down: boolean }
  | { source: 'joystick-button'; index: number; button: number; down: boolean }
  | { source: 'joystick-axis'; index: number; axis: number; value: number };

// ============ Key Table ============

const KEY_CODES: ReadonlyMap<string, number> = new Map(Object.entries(keyTable.keys));

const KEY_NAMES: ReadonlyMap<number, string> = new Map(
  Array.from(KEY_CODES, ([name, code]): [number, string] => [code, name])
);

const MOUSE_ALIASES: Record<'left' | 'right' | 'middle', MouseButtonCode> = {
  left: 'L_MOUSE',
  right: 'R_MOUSE',
  middle: 'M_MOUSE',
};

function isMouseButtonCode(name: string): name is MouseButtonCode {
  return MOUSE_BUTTONS.some((code) => code === name);
}

/**
 * Virtual-key code of a key name, if the table knows it
 */
export function virtualKeyCode(name: string): number | undefined {
  return KEY_CODES.get(name.toUpperCase());
}

/**
 * Key name of a virtual-key code, if the table knows it
 */
export function keyName(code: number): string | undefined {
  return KEY_NAMES.get(code);
}

// ============ Normalization ============

/**
 * @returns the logical input, or null for keys the table does not know
 */
export function toLogicalInput(raw: RawInputEvent): LogicalInput | null {
  switch (raw.source) {
    case 'keyboard': {
      const name = typeof raw.key === 'number' ? keyName(raw.key) : raw.key.toUpperCase();
      if (name === undefined || !KEY_CODES.has(name)) return null;
      if (isMouseButtonCode(name)) return { kind: 'mouse-button', code: name };
      return { kind: 'key', code: name };
    }
    case 'mouse': {
      const code = isMouseButtonCode(raw.button) ? raw.button : MOUSE_ALIASES[raw.button];
      return { kind: 'mouse-button', code };
    }
    case 'joystick-button':
      return { kind: 'joystick-button', code: raw.button, deviceIndex: raw.index };
    case 'joystick-axis':
      return { kind: 'joystick-axis', code: raw.axis, deviceIndex: raw.index };
  }
}
