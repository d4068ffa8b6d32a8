/**
 * Haptic Bridge Centralized Error Types
 *
 * Human-readable error codes with titles and hints for the settings/editor UI.
 * Configuration errors are thrown to the caller; runtime device errors are
 * only logged and reported through engine events.
 */

/** Error severity levels */
export type BridgeErrorSeverity = 'warning' | 'error' | 'fatal';

/** BR_ERR error codes */
export type BridgeErrorCode =
  // Configuration errors
  | 'BR_ERR_UNKNOWN_PRESET'
  | 'BR_ERR_PRESET_IN_USE'
  | 'BR_ERR_INVALID_PRESET'
  | 'BR_ERR_INVALID_BINDING'
  // Persistence errors
  | 'BR_ERR_SNAPSHOT_INVALID'
  | 'BR_ERR_CONFIG_LOAD_FAILED'
  | 'BR_ERR_CONFIG_SAVE_FAILED'
  // Device errors
  | 'BR_ERR_DEVICE_UNREACHABLE'
  | 'BR_ERR_INPUT_DEVICE_LOCKED';

/** Error definition with human-readable messages */
export interface BridgeErrorDef {
  code: BridgeErrorCode;
  title: string;
  body: string;
  hint?: string;
  severity: BridgeErrorSeverity;
}

/** Error catalog mapping codes to definitions */
export const BRIDGE_ERROR_CATALOG: Record<BridgeErrorCode, Omit<BridgeErrorDef, 'code'>> = {
  // Configuration errors
  BR_ERR_UNKNOWN_PRESET: {
    title: 'Unknown Preset',
    body: 'The binding references a preset that does not exist.',
    hint: 'Create the preset first, or pick one from the catalog.',
    severity: 'error',
  },
  BR_ERR_PRESET_IN_USE: {
    title: 'Preset In Use',
    body: 'The preset is still referenced and cannot be deleted.',
    hint: 'Remove the bindings that use it and wait for playback to finish.',
    severity: 'error',
  },
  BR_ERR_INVALID_PRESET: {
    title: 'Invalid Preset',
    body: 'The preset violates a pattern constraint.',
    hint: 'Check offsets, durations, node ids and axis curve coverage.',
    severity: 'error',
  },
  BR_ERR_INVALID_BINDING: {
    title: 'Invalid Binding',
    body: 'The binding does not fit its input or preset.',
    hint: 'Continuous-axis bindings need a joystick axis and a continuous preset.',
    severity: 'error',
  },

  // Persistence errors
  BR_ERR_SNAPSHOT_INVALID: {
    title: 'Invalid Snapshot',
    body: 'The saved bindings and presets could not be read.',
    hint: 'The file may be corrupted or from an incompatible version.',
    severity: 'error',
  },
  BR_ERR_CONFIG_LOAD_FAILED: {
    title: 'Config Load Failed',
    body: 'Could not load the configuration file.',
    hint: 'Defaults are used until the file is fixed.',
    severity: 'warning',
  },
  BR_ERR_CONFIG_SAVE_FAILED: {
    title: 'Config Save Failed',
    body: 'Could not save the configuration file.',
    hint: 'Check disk space and file permissions.',
    severity: 'error',
  },

  // Device errors
  BR_ERR_DEVICE_UNREACHABLE: {
    title: 'Device Unreachable',
    body: 'A stimulus could not be delivered to the output device.',
    hint: 'Check that the vest runtime or the chair app is running.',
    severity: 'warning',
  },
  BR_ERR_INPUT_DEVICE_LOCKED: {
    title: 'Input Device Locked',
    body: 'Exclusive access to an input device could not be acquired.',
    hint: 'Close other programs that capture the controller.',
    severity: 'fatal',
  },
};

/**
 * Get full error definition by code
 */
export function getErrorDef(code: BridgeErrorCode): BridgeErrorDef {
  const def = BRIDGE_ERROR_CATALOG[code];
  return { code, ...def };
}

/**
 * Create a bridge error object for throwing/displaying
 */
export function createBridgeError(
  code: BridgeErrorCode,
  details?: string
): BridgeError {
  const def = getErrorDef(code);
  return new BridgeError(code, def.title, def.body, def.hint, def.severity, details);
}

/**
 * BridgeError class - extends Error with structured info
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly title: string;
  readonly body: string;
  readonly hint?: string;
  readonly severity: BridgeErrorSeverity;
  readonly details?: string;

  constructor(
    code: BridgeErrorCode,
    title: string,
    body: string,
    hint?: string,
    severity: BridgeErrorSeverity = 'error',
    details?: string
  ) {
    super(details ? `${code}: ${title} (${details})` : `${code}: ${title}`);
    this.name = 'BridgeError';
    this.code = code;
    this.title = title;
    this.body = body;
    this.hint = hint;
    this.severity = severity;
    this.details = details;
  }

  /**
   * Get formatted message for UI display (no stack trace)
   */
  toUIMessage(): string {
    const body = this.details ? `${this.body} ${this.details}.` : this.body;
    return body + (this.hint ? ` ${this.hint}` : '');
  }

  /**
   * Get formatted message for console (with code)
   */
  toConsoleMessage(): string {
    let msg = `[${this.code}] ${this.title}: ${this.body}`;
    if (this.details) msg += ` (${this.details})`;
    if (this.hint) msg += ` Hint: ${this.hint}`;
    return msg;
  }
}

export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
  if (!(error instanceof BridgeError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Log bridge error to console
 */
export function logBridgeError(error: BridgeError | BridgeErrorCode, details?: string): void {
  const bridgeError = typeof error === 'string'
    ? createBridgeError(error, details)
    : error;

  if (bridgeError.severity === 'fatal') {
    console.error(bridgeError.toConsoleMessage(), bridgeError);
  } else if (bridgeError.severity === 'error') {
    console.error(bridgeError.toConsoleMessage());
  } else {
    console.warn(bridgeError.toConsoleMessage());
  }
}
