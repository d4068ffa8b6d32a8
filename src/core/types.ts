/**
 * Haptic Bridge Core Types
 *
 * Shared vocabulary for inputs, bindings, presets and device outputs.
 * Persisted shapes (Preset, Binding, snapshot) are inferred from the zod
 * schemas in ../schemas and re-exported here.
 */

// ============ Device Constants ============

/** Motor count of the standard tactsuit (0-19 front, 20-39 back) */
export const VEST_NODE_COUNT = 40;

/** Output axes of the emulated gamepad consumed by the motion chair app */
export const GAMEPAD_AXES = [
  'left_stick_x',
  'left_stick_y',
  'right_stick_x',
  'right_stick_y',
  'left_trigger',
  'right_trigger',
] as const;

export type GamepadAxisId = (typeof GAMEPAD_AXES)[number];

export const MOUSE_BUTTONS = ['L_MOUSE', 'R_MOUSE', 'M_MOUSE'] as const;

export type MouseButtonCode = (typeof MOUSE_BUTTONS)[number];

// ============ Inputs ============

export type LogicalInput =
  | { kind: 'key'; code: string }
  | { kind: 'mouse-button'; code: MouseButtonCode }
  | { kind: 'joystick-button'; code: number; deviceIndex?: number }
  | { kind: 'joystick-axis'; code: number; deviceIndex?: number };

export type LogicalInputKind = LogicalInput['kind'];

export type InputEventKind = 'press' | 'release' | 'axisChange';

export interface InputEvent {
  input: LogicalInput;
  kind: InputEventKind;
  /** 1/0 for press/release, normalized [-1, 1] for axisChange */
  value: number;
  /** Receive time (ms, Date.now clock) */
  t: number;
}

// ============ Bindings ============

export const ACTIVATION_MODES = [
  'on-press',
  'on-release',
  'while-held',
  'continuous-axis',
  'axis-intensity',
] as const;

export type ActivationMode = (typeof ACTIVATION_MODES)[number];

export type AxisDirection = 'both' | 'positive' | 'negative';

// ============ Persisted Shapes ============

export type {
  StimulusStep,
  DiscretePattern,
  AxisCurve,
  ContinuousMapping,
  AxisIntensity,
  PresetPattern,
  Preset,
  PresetInput,
  Binding,
  BindingInput,
  StateSnapshot,
} from '../schemas/presetSchema';
