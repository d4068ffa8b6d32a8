/**
 * Preset Catalog
 *
 * Named stimulus patterns. Validation happens on put; deletion is refused
 * while a binding or a live playback still references the preset.
 */

import type { Preset, PresetInput } from './types';
import type { ConfigStore } from '../store/configStore';
import { validatePreset } from '../schemas/presetSchema';
import { createBridgeError } from './bridgeErrors';
import { bridgeLogger } from './bridgeLogger';

/**
 * Reports whether something outside the config (e.g. a live playback)
 * still needs the preset.
 */
export type PresetUsageProbe = (ref: string) => boolean;

export class PresetCatalog {
  private store: ConfigStore;
  private usageProbes: Set<PresetUsageProbe> = new Set();

  constructor(store: ConfigStore) {
    this.store = store;
  }

  /**
   * Get a preset, throwing BR_ERR_UNKNOWN_PRESET when absent
   */
  get(ref: string): Preset {
    const preset = this.find(ref);
    if (!preset) {
      throw createBridgeError('BR_ERR_UNKNOWN_PRESET', `preset "${ref}"`);
    }
    return preset;
  }

  find(ref: string): Preset | undefined {
    const { presets } = this.store.getState();
    return Object.hasOwn(presets, ref) ? presets[ref] : undefined;
  }

  has(ref: string): boolean {
    return this.find(ref) !== undefined;
  }

  list(): Preset[] {
    return Object.values(this.store.getState().presets);
  }

  /**
   * Validate and store a preset (replaces an existing one with the same ref).
   * Playbacks already running keep the steps they started with.
   */
  put(input: PresetInput): Preset {
    const result = validatePreset(input);
    if (!result.success || !result.data) {
      throw createBridgeError('BR_ERR_INVALID_PRESET', (result.issues ?? []).join('; '));
    }

    this.store.getState().setPreset(result.data);
    bridgeLogger.verbose(`Preset stored: ${result.data.ref}`);
    return result.data;
  }

  delete(ref: string): void {
    if (!this.has(ref)) {
      throw createBridgeError('BR_ERR_UNKNOWN_PRESET', `preset "${ref}"`);
    }

    const boundTo = Object.entries(this.store.getState().bindings)
      .filter(([, binding]) => binding.preset === ref)
      .map(([key]) => key);
    if (boundTo.length > 0) {
      throw createBridgeError('BR_ERR_PRESET_IN_USE', `"${ref}" is bound to ${boundTo.join(', ')}`);
    }

    for (const probe of this.usageProbes) {
      if (probe(ref)) {
        throw createBridgeError('BR_ERR_PRESET_IN_USE', `"${ref}" is currently playing`);
      }
    }

    this.store.getState().removePreset(ref);
    bridgeLogger.verbose(`Preset deleted: ${ref}`);
  }

  /**
   * Register a usage probe consulted by delete()
   * @returns unregister function
   */
  addUsageProbe(probe: PresetUsageProbe): () => void {
    this.usageProbes.add(probe);
    return () => this.usageProbes.delete(probe);
  }
}
