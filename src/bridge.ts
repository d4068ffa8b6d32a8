/**
 * HapticBridge - wires the config store, input listener and dispatch engine
 *
 * @example
 * const bridge = await HapticBridge.fromConfigFile('haptic-bridge.json', { vest, axis });
 * await bridge.attachPoller(joystickPoller);
 * void bridge.run();
 */

import type { InputEvent, StateSnapshot } from './core/types';
import type { AxisSink, VestSink } from './runtime/sinks/types';
import type { BridgeSettings, BridgeSettingsInput } from './schemas/settingsSchema';
import { parseSettingsWithDefaults } from './schemas/settingsSchema';
import { createConfigStore, type ConfigStore } from './store/configStore';
import { PresetCatalog } from './core/presetCatalog';
import { BindingStore } from './core/bindingStore';
import { bridgeLogger } from './core/bridgeLogger';
import { DispatchEngine } from './runtime/dispatchEngine';
import { TaskScheduler } from './runtime/taskScheduler';
import { InputListener, type InputPoller } from './input/inputListener';
import { exportSnapshot, parseSnapshot } from './project/stateSnapshot';
import { loadConfigFile, saveConfigFile } from './project/configFile';

export interface HapticBridgeSinks {
  vest: VestSink;
  axis: AxisSink;
}

export interface HapticBridgeOptions extends HapticBridgeSinks {
  settings?: BridgeSettingsInput;
  /** Untrusted snapshot to start from */
  snapshot?: unknown;
  scheduler?: TaskScheduler;
}

function applyLogSettings(settings: BridgeSettings): void {
  bridgeLogger.setLogLevel(settings.logLevel);
  bridgeLogger.setEnabled(settings.debug || settings.logLevel === 'verbose');
}

export class HapticBridge {
  readonly store: ConfigStore;
  readonly catalog: PresetCatalog;
  readonly bindings: BindingStore;
  readonly engine: DispatchEngine;
  readonly listener: InputListener;
  readonly settings: BridgeSettings;

  private running: Promise<void> | null = null;

  constructor(options: HapticBridgeOptions) {
    this.settings = parseSettingsWithDefaults(options.settings ?? {});
    applyLogSettings(this.settings);

    const seed = options.snapshot === undefined ? {} : parseSnapshot(options.snapshot);
    this.store = createConfigStore(seed);
    this.catalog = new PresetCatalog(this.store);
    this.bindings = new BindingStore(this.store, this.catalog);
    this.engine = new DispatchEngine({
      bindings: this.bindings,
      catalog: this.catalog,
      vest: options.vest,
      axis: options.axis,
      scheduler: options.scheduler,
      settings: this.settings,
    });
    this.listener = new InputListener({
      axisEpsilon: this.settings.axisEpsilon,
      pollIntervalMs: this.settings.pollIntervalMs,
    });
  }

  /**
   * Build a bridge from a config file (missing or broken files give defaults)
   */
  static async fromConfigFile(
    path: string,
    sinks: HapticBridgeSinks,
    env: NodeJS.ProcessEnv = process.env
  ): Promise<HapticBridge> {
    const config = await loadConfigFile(path, env);
    return new HapticBridge({ ...sinks, settings: config.settings, snapshot: config.snapshot });
  }

  // ============ State ============

  exportState(): StateSnapshot {
    return exportSnapshot(this.store);
  }

  /**
   * Replace all presets and bindings. Nothing changes if the snapshot is
   * invalid; otherwise live playbacks are cancelled first.
   */
  importState(data: unknown): StateSnapshot {
    const snapshot = parseSnapshot(data);
    this.engine.cancelAll();
    this.store.getState().replaceAll(snapshot.presets, snapshot.bindings);
    bridgeLogger.info(
      `Imported ${Object.keys(snapshot.presets).length} presets and ${Object.keys(snapshot.bindings).length} bindings`
    );
    return snapshot;
  }

  async save(path: string): Promise<void> {
    await saveConfigFile(path, this.settings, this.exportState());
  }

  // ============ Input ============

  attachPoller(poller: InputPoller, intervalMs?: number): Promise<() => Promise<void>> {
    return this.listener.attachPoller(poller, intervalMs);
  }

  handle(event: InputEvent): void {
    this.engine.handle(event);
  }

  /**
   * Consume the input stream until the listener closes
   */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.consume();
    }
    return this.running;
  }

  private async consume(): Promise<void> {
    for await (const event of this.listener) {
      try {
        this.engine.handle(event);
      } catch (err) {
        bridgeLogger.error('Event handling failed:', err);
      }
    }
  }

  /**
   * Close input, drain the loop, then stop the engine and sinks
   */
  async shutdown(): Promise<void> {
    await this.listener.close();
    if (this.running) await this.running;
    await this.engine.shutdown();
  }
}
