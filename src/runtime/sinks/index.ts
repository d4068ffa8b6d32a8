export type { SinkResult, VestSink, AxisSink } from './types';
export { TactsuitSink, createFrame, type HapticRuntime, type TactsuitSinkOptions } from './TactsuitSink';
export {
  VirtualGamepadSink,
  toStickValue,
  toTriggerValue,
  STICK_MAX,
  TRIGGER_MAX,
  type GamepadDriver,
} from './VirtualGamepadSink';
