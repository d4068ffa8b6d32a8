/**
 * State Snapshot - export/import of presets and bindings
 *
 * The snapshot is the persisted form of the config store:
 * `{ version, presets: Record<ref, Preset>, bindings: Record<inputKey, Binding> }`.
 * Parsing validates everything before the caller replaces any state.
 *
 * @module project/stateSnapshot
 */

import type { Binding, StateSnapshot } from '../core/types';
import type { ConfigStore } from '../store/configStore';
import { SNAPSHOT_VERSION, validateSnapshot } from '../schemas/presetSchema';
import { checkBindingFit } from '../core/bindingStore';
import { createBridgeError } from '../core/bridgeErrors';
import { bridgeLogger } from '../core/bridgeLogger';
import { inputKey } from '../core/logicalInput';

/**
 * Copy the current store contents into a snapshot
 */
export function exportSnapshot(store: ConfigStore): StateSnapshot {
  const { presets, bindings } = store.getState();
  return structuredClone({ version: SNAPSHOT_VERSION, presets, bindings });
}

/**
 * Validate an untrusted snapshot.
 *
 * Bindings are re-keyed by their input so a hand-edited key cannot
 * disagree with the binding it holds.
 */
export function parseSnapshot(data: unknown): StateSnapshot {
  const result = validateSnapshot(data);
  if (!result.success || !result.data) {
    throw createBridgeError('BR_ERR_SNAPSHOT_INVALID', (result.issues ?? []).join('; '));
  }

  const snapshot = result.data;
  if (snapshot.version > SNAPSHOT_VERSION) {
    throw createBridgeError(
      'BR_ERR_SNAPSHOT_INVALID',
      `version ${snapshot.version} is newer than supported version ${SNAPSHOT_VERSION}`
    );
  }

  for (const [key, preset] of Object.entries(snapshot.presets)) {
    if (key !== preset.ref) {
      throw createBridgeError('BR_ERR_SNAPSHOT_INVALID', `preset key "${key}" does not match ref "${preset.ref}"`);
    }
  }

  const bindings: Record<string, Binding> = {};
  for (const [key, binding] of Object.entries(snapshot.bindings)) {
    const preset = Object.hasOwn(snapshot.presets, binding.preset) ? snapshot.presets[binding.preset] : undefined;
    if (!preset) {
      throw createBridgeError('BR_ERR_UNKNOWN_PRESET', `preset "${binding.preset}" bound to ${key}`);
    }

    const mismatch = checkBindingFit(binding, preset.pattern.kind);
    if (mismatch) {
      throw createBridgeError('BR_ERR_INVALID_BINDING', `${key}: ${mismatch}`);
    }

    const canonical = inputKey(binding.input);
    if (canonical !== key) {
      bridgeLogger.verbose(`Snapshot binding "${key}" re-keyed to ${canonical}`);
    }
    bindings[canonical] = binding;
  }

  return { version: SNAPSHOT_VERSION, presets: snapshot.presets, bindings };
}

export function serializeSnapshot(snapshot: StateSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

/**
 * Parse a snapshot from JSON text
 */
export function deserializeSnapshot(json: string): StateSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw createBridgeError('BR_ERR_SNAPSHOT_INVALID', err instanceof Error ? err.message : 'malformed JSON');
  }
  return parseSnapshot(data);
}
