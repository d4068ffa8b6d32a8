/**
 * Haptic Bridge
 *
 * Maps keyboard, mouse and joystick input to haptic vest patterns and
 * motion chair axes.
 */

export { HapticBridge, type HapticBridgeOptions, type HapticBridgeSinks } from './bridge';

export * from './core/types';
export { PresetCatalog, type PresetUsageProbe } from './core/presetCatalog';
export { BindingStore, bindingId, type BindingsListener } from './core/bindingStore';
export { inputKey, describeInput } from './core/logicalInput';
export { axisIntensityLevel, evaluateCurve, mapAxisValue } from './core/axisMapping';
export {
  BridgeError,
  BRIDGE_ERROR_CATALOG,
  createBridgeError,
  getErrorDef,
  isBridgeError,
  logBridgeError,
  type BridgeErrorCode,
  type BridgeErrorDef,
  type BridgeErrorSeverity,
} from './core/bridgeErrors';
export { bridgeLogger, BridgeConsoleLogger, type BridgeLogLevel } from './core/bridgeLogger';

export { createConfigStore, type ConfigState, type ConfigStore } from './store/configStore';
export {
  PresetSchema,
  BindingSchema,
  AxisIntensitySchema,
  DEFAULT_AXIS_INTENSITY,
  StateSnapshotSchema,
  SNAPSHOT_VERSION,
  validatePreset,
  validateBinding,
  validateSnapshot,
  type ValidationResult,
} from './schemas/presetSchema';
export {
  BridgeSettingsSchema,
  getDefaultSettings,
  resolveSettings,
  type BridgeSettings,
  type BridgeSettingsInput,
} from './schemas/settingsSchema';

export { InputListener, type InputListenerOptions, type InputPoller } from './input/inputListener';
export { toLogicalInput, virtualKeyCode, keyName, type RawInputEvent } from './input/normalize';

export {
  exportSnapshot,
  parseSnapshot,
  serializeSnapshot,
  deserializeSnapshot,
} from './project/stateSnapshot';
export { loadConfigFile, saveConfigFile, emptySnapshot, type LoadedConfig } from './project/configFile';

export * from './runtime';
