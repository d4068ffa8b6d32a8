/**
 * Haptic Bridge Config Store (Zustand, vanilla)
 *
 * Single source of truth for presets and bindings. PresetCatalog and
 * BindingStore are thin facades over it; the dispatch engine subscribes
 * to binding changes through subscribeWithSelector.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { Binding, Preset } from '../core/types';

// ============ Types ============

export interface ConfigState {
  /** PresetRef -> Preset */
  presets: Record<string, Preset>;
  /** inputKey -> Binding */
  bindings: Record<string, Binding>;

  // Actions
  setPreset: (preset: Preset) => void;
  removePreset: (ref: string) => void;
  setBinding: (key: string, binding: Binding) => void;
  removeBinding: (key: string) => void;
  replaceAll: (presets: Record<string, Preset>, bindings: Record<string, Binding>) => void;
}

export interface ConfigSeed {
  presets?: Record<string, Preset>;
  bindings?: Record<string, Binding>;
}

// ============ Store ============

export function createConfigStore(seed: ConfigSeed = {}) {
  return createStore<ConfigState>()(
    subscribeWithSelector((set) => ({
      presets: { ...seed.presets },
      bindings: { ...seed.bindings },

      setPreset: (preset) =>
        set((state) => ({ presets: { ...state.presets, [preset.ref]: preset } })),

      removePreset: (ref) =>
        set((state) => {
          const { [ref]: _removed, ...presets } = state.presets;
          return { presets };
        }),

      setBinding: (key, binding) =>
        set((state) => ({ bindings: { ...state.bindings, [key]: binding } })),

      removeBinding: (key) =>
        set((state) => {
          const { [key]: _removed, ...bindings } = state.bindings;
          return { bindings };
        }),

      replaceAll: (presets, bindings) => set({ presets: { ...presets }, bindings: { ...bindings } }),
    }))
  );
}

export type ConfigStore = ReturnType<typeof createConfigStore>;
