/**
 * Dispatch Engine - turns normalized input events into device stimuli
 *
 * Resolves each InputEvent against the binding store, applies the binding's
 * activation mode, and plays presets on the sinks:
 * - discrete presets become ActivePlaybacks whose steps run on the shared
 *   TaskScheduler
 * - continuous presets map the axis value and send it straight away
 * - axis-intensity bindings replay a discrete preset scaled by the axis
 *
 * Overlapping playbacks on one vest node are combined by maximum intensity;
 * the vest only ever sees the strongest live claim for a node.
 * Device failures drop the cue (logged once per preset) and never throw.
 */

import type {
  ActivationMode,
  Binding,
  GamepadAxisId,
  InputEvent,
  StimulusStep,
} from '../core/types';
import type { BindingStore } from '../core/bindingStore';
import type { PresetCatalog } from '../core/presetCatalog';
import type { AxisSink, SinkResult, VestSink } from './sinks/types';
import type { BridgeSettings } from '../schemas/settingsSchema';
import { bindingId } from '../core/bindingStore';
import { inputKey } from '../core/logicalInput';
import { axisIntensityLevel, mapAxisValue } from '../core/axisMapping';
import { DEFAULT_AXIS_INTENSITY } from '../schemas/presetSchema';
import { createBridgeError, logBridgeError } from '../core/bridgeErrors';
import { bridgeLogger } from '../core/bridgeLogger';
import { clamp01 } from '../utils/math';
import { DeviceState, type ActivePlayback, type NodeOutput } from './deviceState';
import { TaskScheduler, type TaskId } from './taskScheduler';
import { LatencyMetrics, type LatencyStats } from './latencyMetrics';

// ============ Types ============

export type PlaybackEndReason = 'completed' | 'cancelled' | 'restarted' | 'failed';

export type SinkTarget = 'vest' | 'axis';

export type EngineEvent =
  | { type: 'playback-started'; playbackId: string; presetRef: string; inputKey: string | null }
  | { type: 'playback-ended'; playbackId: string; presetRef: string; reason: PlaybackEndReason }
  | { type: 'device-unreachable'; presetRef: string; target: SinkTarget }
  | { type: 'binding-toggled'; bindingId: string; enabled: boolean };

export type EngineListener = (event: EngineEvent) => void;

export interface DispatchEngineOptions {
  bindings: BindingStore;
  catalog: PresetCatalog;
  vest: VestSink;
  axis: AxisSink;
  scheduler?: TaskScheduler;
  metrics?: LatencyMetrics;
  settings?: Partial<Pick<BridgeSettings, 'masterIntensity' | 'axisKeepAliveMs'>>;
}

export interface EngineStats {
  livePlaybacks: number;
  pendingTasks: number;
  heldInputs: number;
  paused: boolean;
  disabledBindings: string[];
  latency: LatencyStats;
}

/** Transient per-input state between press and release */
interface HeldInput {
  mode: ActivationMode;
  playbackId?: string;
  holdTask?: TaskId;
  repeatTask?: TaskId;
}

/** Replay state of an axis-intensity binding while its axis is deflected */
interface AxisDrive {
  level: number;
  task?: TaskId;
}

const KEEPALIVE_OWNER = 'axis-keepalive';

// ============ Engine ============

export class DispatchEngine {
  private bindings: BindingStore;
  private catalog: PresetCatalog;
  private vest: VestSink;
  private axis: AxisSink;
  private scheduler: TaskScheduler;
  private metrics: LatencyMetrics;

  private state: DeviceState = new DeviceState();
  /** inputKey -> held state */
  private held: Map<string, HeldInput> = new Map();
  /** inputKey -> live playback fired from that input */
  private playbackByInput: Map<string, string> = new Map();
  /** inputKey -> axis-intensity replay */
  private axisDrives: Map<string, AxisDrive> = new Map();

  private disabled: Set<string> = new Set();
  private knownBindingIds: Set<string> = new Set();
  /** Presets already reported as undeliverable this session */
  private reportedFailures: Set<string> = new Set();
  private listeners: Set<EngineListener> = new Set();
  private unsubscribers: Array<() => void> = [];

  private masterIntensity: number;
  private keepAliveMs: number;
  private paused: boolean = false;
  private stopped: boolean = false;
  private playbackCounter: number = 0;

  constructor(options: DispatchEngineOptions) {
    this.bindings = options.bindings;
    this.catalog = options.catalog;
    this.vest = options.vest;
    this.axis = options.axis;
    this.scheduler = options.scheduler ?? new TaskScheduler();
    this.metrics = options.metrics ?? new LatencyMetrics();
    this.masterIntensity = clamp01(options.settings?.masterIntensity ?? 1);
    this.keepAliveMs = options.settings?.axisKeepAliveMs ?? 0;

    this.syncBindingStates(this.bindings.list());
    this.unsubscribers.push(
      this.bindings.onChange((bindings) => this.syncBindingStates(Object.values(bindings))),
      this.catalog.addUsageProbe((ref) => this.state.isPresetLive(ref))
    );

    if (this.keepAliveMs > 0) this.scheduleKeepAlive();
  }

  // ============ Input ============

  /**
   * Handle one normalized input event. Unbound inputs are ignored.
   */
  handle(event: InputEvent): void {
    if (this.stopped) return;

    const recvTime = this.metrics.startTiming();
    const key = inputKey(event.input);

    switch (event.kind) {
      case 'press':
        this.handlePress(event, key);
        break;
      case 'release':
        this.handleRelease(event, key);
        break;
      case 'axisChange':
        this.handleAxis(event, key);
        break;
    }

    this.metrics.record(event.kind, recvTime);
  }

  private handlePress(event: InputEvent, key: string): void {
    const binding = this.bindings.resolve(event.input);
    if (!binding || binding.mode === 'continuous-axis' || binding.mode === 'axis-intensity') return;
    if (this.held.has(key)) return;

    const entry: HeldInput = { mode: binding.mode };
    this.held.set(key, entry);
    if (binding.mode === 'on-release') return;

    if (binding.holdMs > 0) {
      entry.holdTask = this.scheduler.schedule(binding.holdMs, `hold:${key}`, () => {
        entry.holdTask = undefined;
        this.activate(key, binding, entry);
      });
      return;
    }

    this.activate(key, binding, entry);
  }

  private handleRelease(event: InputEvent, key: string): void {
    const entry = this.held.get(key);
    if (entry) {
      this.held.delete(key);
      if (entry.holdTask !== undefined) this.scheduler.cancel(entry.holdTask);
      if (entry.repeatTask !== undefined) this.scheduler.cancel(entry.repeatTask);
      if (entry.mode === 'while-held' && entry.playbackId) {
        this.endPlayback(entry.playbackId, 'cancelled');
      }
    }

    const binding = this.bindings.resolve(event.input);
    if (!binding || binding.mode !== 'on-release' || !entry) return;

    this.fire(key, binding);
  }

  private handleAxis(event: InputEvent, key: string): void {
    const binding = this.bindings.resolve(event.input);
    if (binding?.mode === 'axis-intensity') {
      this.driveFromAxis(key, binding, event.value);
      return;
    }
    if (!binding || binding.mode !== 'continuous-axis') return;
    if (this.disabled.has(bindingId(binding))) return;

    const preset = this.catalog.find(binding.preset);
    if (!preset || preset.pattern.kind !== 'continuous') {
      bridgeLogger.warn(`No continuous preset "${binding.preset}" for ${key}`);
      return;
    }

    const { axisId } = preset.pattern;
    const value = mapAxisValue(preset.pattern, event.value);
    // Last writer wins when several inputs drive the same output axis
    this.state.setAxis(axisId, value);

    if (this.paused) return;
    this.deliverAxis(axisId, value, preset.ref);
  }

  /**
   * The deflection sets the intensity of the replayed preset. Once the level
   * drops under the floor, replaying stops and the current run plays out.
   */
  private driveFromAxis(key: string, binding: Binding, raw: number): void {
    const level = axisIntensityLevel(binding.axisIntensity ?? DEFAULT_AXIS_INTENSITY, raw);
    const drive = this.axisDrives.get(key);

    if (level === 0) {
      if (drive) {
        if (drive.task !== undefined) this.scheduler.cancel(drive.task);
        this.axisDrives.delete(key);
      }
      return;
    }

    if (drive) {
      drive.level = level;
      return;
    }

    const started: AxisDrive = { level };
    this.axisDrives.set(key, started);
    this.replayDrive(key, binding, started);
  }

  private replayDrive(key: string, binding: Binding, drive: AxisDrive): void {
    this.fire(key, binding, drive.level);
    const { replayMs } = binding.axisIntensity ?? DEFAULT_AXIS_INTENSITY;
    drive.task = this.scheduler.schedule(replayMs, `drive:${key}`, () => {
      drive.task = undefined;
      if (this.axisDrives.get(key) !== drive) return;
      this.replayDrive(key, binding, drive);
    });
  }

  /**
   * Press reached its hold threshold: fire, then start turbo if configured
   */
  private activate(key: string, binding: Binding, entry: HeldInput): void {
    entry.playbackId = this.fire(key, binding) ?? undefined;
    if (binding.repeatMs > 0) this.scheduleRepeat(key, binding, entry);
  }

  private scheduleRepeat(key: string, binding: Binding, entry: HeldInput): void {
    entry.repeatTask = this.scheduler.schedule(binding.repeatMs, `repeat:${key}`, () => {
      entry.repeatTask = undefined;
      if (this.held.get(key) !== entry) return;
      entry.playbackId = this.fire(key, binding) ?? undefined;
      this.scheduleRepeat(key, binding, entry);
    });
  }

  // ============ Firing ============

  /**
   * Fire a discrete binding. A playback still running for the same input
   * is cancelled and the pattern restarts from offset 0.
   * @param scale - multiplies step intensities on top of master intensity
   * @returns new playback id, or null when nothing was started
   */
  private fire(key: string, binding: Binding, scale: number = 1): string | null {
    if (this.paused) return null;

    const id = bindingId(binding);
    if (this.disabled.has(id)) {
      bridgeLogger.verbose(`Binding ${id} is disabled, ignoring trigger`);
      return null;
    }
    this.applyToggles(binding);

    const preset = this.catalog.find(binding.preset);
    if (!preset || preset.pattern.kind !== 'discrete') {
      bridgeLogger.warn(`No discrete preset "${binding.preset}" for ${key}`);
      return null;
    }

    const dirty = new Set<number>();
    const previous = this.playbackByInput.get(key);
    if (previous) this.endPlayback(previous, 'restarted', dirty);

    const started = new Set<number>();
    const playbackId = this.startPlayback(key, preset.ref, preset.pattern.steps, scale, started);
    for (const nodeId of dirty) {
      if (!started.has(nodeId)) this.refreshNode(nodeId);
    }
    // A restart re-sends step 0 even when the vest already holds that output
    this.refreshNodes(started, previous !== undefined);
    return playbackId;
  }

  private startPlayback(
    key: string | null,
    presetRef: string,
    steps: readonly StimulusStep[],
    scale: number,
    dirty: Set<number>
  ): string {
    const now = this.scheduler.now();
    const id = `pb_${++this.playbackCounter}`;
    const copied = steps.map((step) => ({ ...step }));

    const playback: ActivePlayback = {
      id,
      presetRef,
      inputKey: key,
      steps: copied,
      startedAt: now,
      endsAt: now + Math.max(...copied.map((s) => s.startOffsetMs + s.durationMs)),
      intensityScale: this.masterIntensity * scale,
    };

    this.state.addPlayback(playback);
    if (key !== null) this.playbackByInput.set(key, id);
    this.emit({ type: 'playback-started', playbackId: id, presetRef, inputKey: key });
    bridgeLogger.verbose(`Playback ${id} started: ${presetRef}`);

    // Steps sharing an offset are applied together so the vest never
    // sees an intermediate maximum
    const groups = new Map<number, StimulusStep[]>();
    for (const step of copied) {
      const group = groups.get(step.startOffsetMs);
      if (group) group.push(step);
      else groups.set(step.startOffsetMs, [step]);
    }

    for (const [offset, group] of groups) {
      if (offset === 0) {
        this.applySteps(playback, group, dirty);
        continue;
      }
      this.scheduler.schedule(offset, id, () => {
        const touched = new Set<number>();
        this.applySteps(playback, group, touched);
        this.refreshNodes(touched);
      });
    }

    this.scheduler.schedule(playback.endsAt - now, id, () => {
      this.endPlayback(id, 'completed');
    });

    return id;
  }

  private applySteps(playback: ActivePlayback, steps: StimulusStep[], dirty: Set<number>): void {
    if (!this.state.getPlayback(playback.id)) return;

    const now = this.scheduler.now();
    for (const step of steps) {
      if (step.durationMs <= 0) continue;

      this.state.addContribution(step.nodeId, {
        playbackId: playback.id,
        presetRef: playback.presetRef,
        intensity: clamp01(step.intensity * playback.intensityScale),
        until: now + step.durationMs,
      });
      this.scheduler.schedule(step.durationMs, playback.id, () => {
        this.refreshNodes([step.nodeId]);
      });
      dirty.add(step.nodeId);
    }
  }

  /**
   * Remove a playback, its pending steps and its node claims.
   * With `dirty`, node refresh is left to the caller.
   * @returns false if the playback was not live
   */
  private endPlayback(id: string, reason: PlaybackEndReason, dirty?: Set<number>): boolean {
    const playback = this.state.getPlayback(id);
    if (!playback) return false;

    this.scheduler.cancelOwner(id);
    const affected = this.state.removePlayback(id);
    if (playback.inputKey !== null && this.playbackByInput.get(playback.inputKey) === id) {
      this.playbackByInput.delete(playback.inputKey);
    }

    if (dirty) {
      for (const nodeId of affected) dirty.add(nodeId);
    } else {
      // A failed device gets no stop command; it never took the cue
      for (const nodeId of affected) this.refreshNode(nodeId, reason !== 'failed');
    }

    this.emit({ type: 'playback-ended', playbackId: id, presetRef: playback.presetRef, reason });
    bridgeLogger.verbose(`Playback ${id} ended (${reason}): ${playback.presetRef}`);
    return true;
  }

  // ============ Node Output ============

  private refreshNodes(nodes: Iterable<number>, force: boolean = false): void {
    for (const nodeId of nodes) this.refreshNode(nodeId, true, force);
  }

  /**
   * Bring the vest node in line with its strongest live claim.
   * With `force`, the claim is sent even if it matches the last output.
   */
  private refreshNode(nodeId: number, allowStop: boolean = true, force: boolean = false): void {
    const now = this.scheduler.now();
    this.state.pruneNode(nodeId, now);

    const top = this.state.topContribution(nodeId);
    const last = this.state.getLastOutput(nodeId);

    if (!top) {
      this.state.setLastOutput(nodeId, undefined);
      if (allowStop && last && last.until > now) {
        this.deliverVest(nodeId, 0, 0, null, null);
      }
      return;
    }

    if (!force && last && last.intensity === top.intensity && last.until === top.until) return;

    // Record before sending: a synchronous failure re-enters refreshNode
    const output: NodeOutput = { intensity: top.intensity, until: top.until };
    this.state.setLastOutput(nodeId, output);
    this.deliverVest(nodeId, top.intensity, top.until - now, top.presetRef, top.playbackId);
  }

  // ============ Delivery ============

  private deliverVest(
    nodeId: number,
    intensity: number,
    durationMs: number,
    presetRef: string | null,
    playbackId: string | null
  ): void {
    let result: SinkResult;
    try {
      result = this.vest.sendStimulus(nodeId, intensity, durationMs);
    } catch (err) {
      this.handleDeliveryFailure('vest', presetRef, playbackId, err);
      return;
    }
    this.trackResult(result, 'vest', presetRef, playbackId);
  }

  private deliverAxis(axisId: GamepadAxisId, value: number, presetRef: string | null): void {
    let result: SinkResult;
    try {
      result = this.axis.sendAxis(axisId, value);
    } catch (err) {
      this.handleDeliveryFailure('axis', presetRef, null, err);
      return;
    }
    this.trackResult(result, 'axis', presetRef, null);
  }

  private trackResult(
    result: SinkResult,
    target: SinkTarget,
    presetRef: string | null,
    playbackId: string | null
  ): void {
    if (typeof result === 'boolean') {
      if (!result) this.handleDeliveryFailure(target, presetRef, playbackId);
      return;
    }

    void result.then(
      (ok) => {
        if (!ok) this.handleDeliveryFailure(target, presetRef, playbackId);
      },
      (err: unknown) => this.handleDeliveryFailure(target, presetRef, playbackId, err)
    );
  }

  /**
   * Cue dropped: report once per preset, cancel the playback, carry on.
   * There is no mid-pattern retry; the next trigger tries the device again.
   */
  private handleDeliveryFailure(
    target: SinkTarget,
    presetRef: string | null,
    playbackId: string | null,
    cause?: unknown
  ): void {
    if (this.stopped) return;

    if (presetRef === null) {
      // stop commands and keep-alive resends
      bridgeLogger.verbose(`${target} housekeeping send failed`, cause);
    } else if (!this.reportedFailures.has(presetRef)) {
      this.reportedFailures.add(presetRef);
      logBridgeError(createBridgeError('BR_ERR_DEVICE_UNREACHABLE', `${target} dropped preset "${presetRef}"`));
      if (cause !== undefined) bridgeLogger.error(`Delivery error for ${presetRef}:`, cause);
      this.emit({ type: 'device-unreachable', presetRef, target });
    }

    if (playbackId !== null) this.endPlayback(playbackId, 'failed');
  }

  // ============ Axes ============

  private resendAxes(): void {
    for (const [axisId, value] of this.state.axisEntries()) {
      this.deliverAxis(axisId, value, null);
    }
  }

  private scheduleKeepAlive(): void {
    this.scheduler.schedule(this.keepAliveMs, KEEPALIVE_OWNER, () => {
      if (!this.paused) this.resendAxes();
      this.scheduleKeepAlive();
    });
  }

  // ============ Binding Enable State ============

  private syncBindingStates(bindings: Binding[]): void {
    const present = new Set<string>();
    for (const binding of bindings) {
      const id = bindingId(binding);
      present.add(id);
      if (this.knownBindingIds.has(id)) continue;
      this.knownBindingIds.add(id);
      if (binding.startDisabled) this.disabled.add(id);
    }

    for (const id of this.knownBindingIds) {
      if (present.has(id)) continue;
      this.knownBindingIds.delete(id);
      this.disabled.delete(id);
    }
  }

  private applyToggles(binding: Binding): void {
    let changed = false;

    for (const name of binding.disables) {
      if (this.disabled.has(name)) continue;
      this.disabled.add(name);
      changed = true;
      this.emit({ type: 'binding-toggled', bindingId: name, enabled: false });
    }
    for (const name of binding.enables) {
      if (!this.disabled.delete(name)) continue;
      changed = true;
      this.emit({ type: 'binding-toggled', bindingId: name, enabled: true });
    }

    if (changed) {
      bridgeLogger.info(`[${bindingId(binding)}] Triggered. Disabled: ${Array.from(this.disabled).join(', ') || 'none'}`);
    }
  }

  isBindingEnabled(id: string): boolean {
    return !this.disabled.has(id);
  }

  setBindingEnabled(id: string, enabled: boolean): void {
    const changed = enabled ? this.disabled.delete(id) : !this.disabled.has(id);
    if (!enabled) this.disabled.add(id);
    if (changed) this.emit({ type: 'binding-toggled', bindingId: id, enabled });
  }

  // ============ Control ============

  /**
   * Suspend delivery. Live playbacks are cancelled; held inputs, axis
   * values and configuration are kept.
   */
  pause(): void {
    if (this.paused || this.stopped) return;
    this.paused = true;
    this.cancelAll();
    bridgeLogger.info('Dispatch paused');
  }

  /**
   * Resume delivery and re-send the last value of every output axis
   */
  resume(): void {
    if (!this.paused || this.stopped) return;
    this.paused = false;
    this.resendAxes();
    bridgeLogger.info('Dispatch resumed');
  }

  isPaused(): boolean {
    return this.paused;
  }

  setMasterIntensity(value: number): void {
    this.masterIntensity = clamp01(value);
  }

  /**
   * Cancel every live playback
   */
  cancelAll(): void {
    for (const playback of this.state.livePlaybacks()) {
      this.endPlayback(playback.id, 'cancelled');
    }
  }

  /**
   * Cancel live playbacks, stop timers and release the sinks
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;

    this.cancelAll();
    this.stopped = true;
    this.held.clear();
    this.playbackByInput.clear();
    this.axisDrives.clear();
    this.scheduler.dispose();
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];

    const stops = await Promise.allSettled([this.vest.stopAll?.(), this.axis.stopAll?.()]);
    const closes = await Promise.allSettled([this.vest.close?.(), this.axis.close?.()]);
    for (const outcome of [...stops, ...closes]) {
      if (outcome.status === 'rejected') {
        bridgeLogger.warn('Sink shutdown failed:', outcome.reason);
      }
    }

    this.state.clear();
    if (this.metrics.getStats().count > 0) this.metrics.logStats();
    bridgeLogger.info('Dispatch engine shut down');
  }

  // ============ Observation ============

  /**
   * Subscribe to engine events
   * @returns unsubscribe function
   */
  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error('[DispatchEngine] Listener threw:', err);
      }
    }
  }

  getDeviceState(): ReturnType<DeviceState['describe']> {
    return this.state.describe();
  }

  livePlaybacks(): ActivePlayback[] {
    return this.state.livePlaybacks();
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  getStats(): EngineStats {
    return {
      livePlaybacks: this.state.playbackCount,
      pendingTasks: this.scheduler.pendingCount(),
      heldInputs: this.held.size,
      paused: this.paused,
      disabledBindings: Array.from(this.disabled),
      latency: this.metrics.getStats(),
    };
  }

  getMetrics(): LatencyMetrics {
    return this.metrics;
  }
}
