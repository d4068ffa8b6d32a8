/**
 * Binding Store
 *
 * LogicalInput -> Binding lookup. One binding per input; upsert replaces.
 */

import type { Binding, BindingInput, LogicalInput } from './types';
import type { ConfigStore } from '../store/configStore';
import type { PresetCatalog } from './presetCatalog';
import { validateBinding } from '../schemas/presetSchema';
import { createBridgeError } from './bridgeErrors';
import { bridgeLogger } from './bridgeLogger';
import { describeInput, inputKey } from './logicalInput';

export type BindingsListener = (
  bindings: Record<string, Binding>,
  previous: Record<string, Binding>
) => void;

/**
 * Id used by enables/disables lists: explicit name, else the input key.
 */
export function bindingId(binding: Binding): string {
  return binding.name ?? inputKey(binding.input);
}

export class BindingStore {
  private store: ConfigStore;
  private catalog: PresetCatalog;

  constructor(store: ConfigStore, catalog: PresetCatalog) {
    this.store = store;
    this.catalog = catalog;
  }

  resolve(input: LogicalInput): Binding | undefined {
    return this.store.getState().bindings[inputKey(input)];
  }

  list(): Binding[] {
    return Object.values(this.store.getState().bindings);
  }

  /**
   * Validate and store a binding, replacing any binding on the same input.
   */
  upsert(input: BindingInput): Binding {
    const result = validateBinding(input);
    if (!result.success || !result.data) {
      throw createBridgeError('BR_ERR_INVALID_BINDING', (result.issues ?? []).join('; '));
    }

    const binding = result.data;
    const preset = this.catalog.find(binding.preset);
    if (!preset) {
      throw createBridgeError('BR_ERR_UNKNOWN_PRESET', `preset "${binding.preset}"`);
    }

    const mismatch = checkBindingFit(binding, preset.pattern.kind);
    if (mismatch) {
      throw createBridgeError('BR_ERR_INVALID_BINDING', mismatch);
    }

    this.store.getState().setBinding(inputKey(binding.input), binding);
    bridgeLogger.verbose(`Binding stored: ${describeInput(binding.input)} -> ${binding.preset} (${binding.mode})`);
    return binding;
  }

  /**
   * @returns true if a binding was removed
   */
  remove(input: LogicalInput): boolean {
    const key = inputKey(input);
    if (!Object.hasOwn(this.store.getState().bindings, key)) return false;

    this.store.getState().removeBinding(key);
    bridgeLogger.verbose(`Binding removed: ${describeInput(input)}`);
    return true;
  }

  /**
   * Subscribe to binding table changes
   * @returns unsubscribe function
   */
  onChange(listener: BindingsListener): () => void {
    return this.store.subscribe((state) => state.bindings, listener);
  }
}

/**
 * @returns description of the mismatch, or null when the binding fits
 */
export function checkBindingFit(binding: Binding, presetKind: 'discrete' | 'continuous'): string | null {
  const isAxisMode = binding.mode === 'continuous-axis' || binding.mode === 'axis-intensity';

  if (isAxisMode && binding.input.kind !== 'joystick-axis') {
    return `${binding.mode} mode requires a joystick axis input`;
  }
  if (!isAxisMode && binding.input.kind === 'joystick-axis') {
    return `${binding.mode} mode cannot be used on a joystick axis`;
  }

  // axis-intensity plays discrete presets like the button modes
  const wanted = binding.mode === 'continuous-axis' ? 'continuous' : 'discrete';
  if (presetKind !== wanted) {
    return `${binding.mode} mode requires a ${wanted} preset, "${binding.preset}" is ${presetKind}`;
  }
  return null;
}
