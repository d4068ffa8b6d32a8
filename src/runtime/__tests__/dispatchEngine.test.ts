/**
 * Dispatch Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DispatchEngine, type EngineEvent } from '../dispatchEngine';
import { createConfigStore } from '../../store/configStore';
import { PresetCatalog } from '../../core/presetCatalog';
import { BindingStore } from '../../core/bindingStore';
import { isBridgeError } from '../../core/bridgeErrors';
import { bridgeLogger } from '../../core/bridgeLogger';
import type { BindingInput, InputEvent, LogicalInput, StimulusStep } from '../../core/types';
import type { BridgeSettings } from '../../schemas/settingsSchema';
import { RecordingAxis, RecordingVest, flushMicrotasks } from './fakeSinks';

// ============ Fixtures ============

function setup(settings?: Partial<Pick<BridgeSettings, 'masterIntensity' | 'axisKeepAliveMs'>>) {
  const store = createConfigStore();
  const catalog = new PresetCatalog(store);
  const bindings = new BindingStore(store, catalog);
  const vest = new RecordingVest();
  const axis = new RecordingAxis();
  const engine = new DispatchEngine({ bindings, catalog, vest, axis, settings });
  const events: EngineEvent[] = [];
  engine.subscribe((event) => events.push(event));
  return { store, catalog, bindings, vest, axis, engine, events };
}

type Ctx = ReturnType<typeof setup>;

function key(code: string): LogicalInput {
  return { kind: 'key', code };
}

function stick(code: number): LogicalInput {
  return { kind: 'joystick-axis', code };
}

function press(input: LogicalInput): InputEvent {
  return { input, kind: 'press', value: 1, t: Date.now() };
}

function release(input: LogicalInput): InputEvent {
  return { input, kind: 'release', value: 0, t: Date.now() };
}

function move(input: LogicalInput, value: number): InputEvent {
  return { input, kind: 'axisChange', value, t: Date.now() };
}

function step(nodeId: number, intensity: number, startOffsetMs: number, durationMs: number): StimulusStep {
  return { nodeId, intensity, startOffsetMs, durationMs };
}

function addDiscrete(ctx: Ctx, ref: string, steps: StimulusStep[]): void {
  ctx.catalog.put({ ref, pattern: { kind: 'discrete', steps } });
}

function bind(ctx: Ctx, binding: BindingInput): void {
  ctx.bindings.upsert(binding);
}

function addStickMapping(ctx: Ctx): void {
  ctx.catalog.put({
    ref: 'lean',
    pattern: { kind: 'continuous', axisId: 'left_stick_x', deadzone: 0 },
  });
}

// ============ Tests ============

describe('DispatchEngine', () => {
  let ctx: Ctx;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    ctx = setup();
  });

  afterEach(async () => {
    await ctx.engine.shutdown();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('on-press', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'reload', [step(2, 0.6, 0, 150)]);
      bind(ctx, { input: key('R'), preset: 'reload', mode: 'on-press' });
    });

    it('sends the first step synchronously and removes the playback at its end', () => {
      ctx.engine.handle(press(key('R')));

      expect(ctx.vest.calls).toEqual([[2, 0.6, 150]]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);

      vi.advanceTimersByTime(150);

      expect(ctx.vest.calls).toEqual([[2, 0.6, 150]]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
      expect(ctx.events.map((e) => e.type)).toEqual(['playback-started', 'playback-ended']);
      expect(ctx.events[1]).toMatchObject({ reason: 'completed', presetRef: 'reload' });
    });

    it('fires once for repeated presses without a release', () => {
      ctx.engine.handle(press(key('R')));
      ctx.engine.handle(press(key('R')));
      ctx.engine.handle(press(key('R')));

      expect(ctx.vest.calls).toHaveLength(1);
    });

    it('ignores the release', () => {
      ctx.engine.handle(press(key('R')));
      vi.advanceTimersByTime(50);
      ctx.engine.handle(release(key('R')));

      expect(ctx.vest.calls).toEqual([[2, 0.6, 150]]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);
    });

    it('restarts a live playback from offset 0 on re-trigger', () => {
      addDiscrete(ctx, 'burst', [step(3, 0.5, 0, 300)]);
      bind(ctx, { input: key('B'), preset: 'burst', mode: 'on-press' });

      ctx.engine.handle(press(key('B')));
      vi.advanceTimersByTime(100);
      ctx.engine.handle(release(key('B')));
      ctx.engine.handle(press(key('B')));

      expect(ctx.vest.calls).toEqual([
        [3, 0.5, 300],
        [3, 0.5, 300],
      ]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);
      expect(ctx.events.filter((e) => e.type === 'playback-ended')).toEqual([
        expect.objectContaining({ reason: 'restarted', presetRef: 'burst' }),
      ]);

      vi.advanceTimersByTime(299);
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
      expect(ctx.vest.calls).toHaveLength(2);
    });

    it('re-sends step 0 on a re-trigger in the same millisecond', () => {
      addDiscrete(ctx, 'pulse', [step(3, 0.5, 0, 100), step(4, 0.8, 100, 100)]);
      bind(ctx, { input: key('P'), preset: 'pulse', mode: 'on-press' });

      ctx.engine.handle(press(key('P')));
      ctx.engine.handle(release(key('P')));
      ctx.engine.handle(press(key('P')));

      expect(ctx.vest.calls).toEqual([
        [3, 0.5, 100],
        [3, 0.5, 100],
      ]);

      vi.advanceTimersByTime(200);
      expect(ctx.vest.calls).toEqual([
        [3, 0.5, 100],
        [3, 0.5, 100],
        [4, 0.8, 100],
      ]);
    });

    it('drops the later steps of the restarted run', () => {
      addDiscrete(ctx, 'pulse', [step(3, 0.5, 0, 100), step(4, 0.8, 100, 100)]);
      bind(ctx, { input: key('P'), preset: 'pulse', mode: 'on-press' });

      ctx.engine.handle(press(key('P')));
      ctx.engine.handle(release(key('P')));
      vi.advanceTimersByTime(50);
      ctx.engine.handle(press(key('P')));

      vi.advanceTimersByTime(99);
      expect(ctx.vest.calls).toEqual([
        [3, 0.5, 100],
        [3, 0.5, 100],
      ]);

      vi.advanceTimersByTime(1);
      expect(ctx.vest.calls).toEqual([
        [3, 0.5, 100],
        [3, 0.5, 100],
        [4, 0.8, 100],
      ]);

      vi.advanceTimersByTime(100);
      expect(ctx.vest.calls).toHaveLength(3);
      expect(ctx.engine.getStats().pendingTasks).toBe(0);
    });

    it('ignores unbound inputs', () => {
      ctx.engine.handle(press(key('Q')));
      ctx.engine.handle(release(key('Q')));

      expect(ctx.vest.calls).toEqual([]);
      expect(ctx.events).toEqual([]);
    });
  });

  describe('pattern scheduling', () => {
    it('sends later steps at their offsets', () => {
      addDiscrete(ctx, 'sweep', [step(0, 1, 0, 100), step(1, 0.5, 100, 100)]);
      bind(ctx, { input: key('S'), preset: 'sweep', mode: 'on-press' });

      ctx.engine.handle(press(key('S')));
      vi.advanceTimersByTime(99);
      expect(ctx.vest.calls).toEqual([[0, 1, 100]]);

      vi.advanceTimersByTime(1);
      expect(ctx.vest.calls).toEqual([
        [0, 1, 100],
        [1, 0.5, 100],
      ]);

      vi.advanceTimersByTime(100);
      expect(ctx.vest.calls).toHaveLength(2);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
    });

    it('skips zero-duration steps', () => {
      addDiscrete(ctx, 'tap', [step(4, 1, 0, 0), step(5, 0.3, 0, 80)]);
      bind(ctx, { input: key('T'), preset: 'tap', mode: 'on-press' });

      ctx.engine.handle(press(key('T')));

      expect(ctx.vest.calls).toEqual([[5, 0.3, 80]]);
    });

    it('keeps playing the fired steps after the preset is replaced', () => {
      addDiscrete(ctx, 'sweep', [step(0, 1, 0, 100), step(1, 0.5, 100, 100)]);
      bind(ctx, { input: key('S'), preset: 'sweep', mode: 'on-press' });

      ctx.engine.handle(press(key('S')));
      addDiscrete(ctx, 'sweep', [step(9, 0.2, 0, 50)]);
      vi.advanceTimersByTime(100);

      expect(ctx.vest.calls).toEqual([
        [0, 1, 100],
        [1, 0.5, 100],
      ]);
    });

    it('scales intensities by master intensity', async () => {
      await ctx.engine.shutdown();
      ctx = setup({ masterIntensity: 0.5 });
      addDiscrete(ctx, 'reload', [step(2, 0.6, 0, 150)]);
      bind(ctx, { input: key('R'), preset: 'reload', mode: 'on-press' });

      ctx.engine.handle(press(key('R')));

      expect(ctx.vest.calls).toHaveLength(1);
      expect(ctx.vest.calls[0][0]).toBe(2);
      expect(ctx.vest.calls[0][1]).toBeCloseTo(0.3);
      expect(ctx.vest.calls[0][2]).toBe(150);
    });
  });

  describe('on-release', () => {
    it('fires when a held input is released', () => {
      addDiscrete(ctx, 'land', [step(10, 0.9, 0, 120)]);
      bind(ctx, { input: key('SPACE'), preset: 'land', mode: 'on-release' });

      ctx.engine.handle(press(key('SPACE')));
      expect(ctx.vest.calls).toEqual([]);

      vi.advanceTimersByTime(400);
      ctx.engine.handle(release(key('SPACE')));
      expect(ctx.vest.calls).toEqual([[10, 0.9, 120]]);
    });

    it('does not fire for a release without a press', () => {
      addDiscrete(ctx, 'land', [step(10, 0.9, 0, 120)]);
      bind(ctx, { input: key('SPACE'), preset: 'land', mode: 'on-release' });

      ctx.engine.handle(release(key('SPACE')));

      expect(ctx.vest.calls).toEqual([]);
    });
  });

  describe('while-held', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'rumble', [step(5, 0.8, 0, 1000)]);
      bind(ctx, { input: key('W'), preset: 'rumble', mode: 'while-held' });
    });

    it('stops the node when released early', () => {
      ctx.engine.handle(press(key('W')));
      vi.advanceTimersByTime(200);
      ctx.engine.handle(release(key('W')));

      expect(ctx.vest.calls).toEqual([
        [5, 0.8, 1000],
        [5, 0, 0],
      ]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
      expect(ctx.events[1]).toMatchObject({ type: 'playback-ended', reason: 'cancelled' });
    });

    it('creates and cancels exactly one playback for a press and immediate release', () => {
      addDiscrete(ctx, 'wave', [step(5, 0.8, 0, 300), step(6, 0.6, 100, 300)]);
      bind(ctx, { input: key('H'), preset: 'wave', mode: 'while-held' });

      ctx.engine.handle(press(key('H')));
      ctx.engine.handle(release(key('H')));

      expect(ctx.events.map((e) => e.type)).toEqual(['playback-started', 'playback-ended']);
      expect(ctx.events[1]).toMatchObject({ presetRef: 'wave', reason: 'cancelled' });
      expect(ctx.engine.getStats().pendingTasks).toBe(0);

      vi.advanceTimersByTime(1000);
      expect(ctx.vest.calls).toEqual([
        [5, 0.8, 300],
        [5, 0, 0],
      ]);
    });

    it('sends nothing on release after natural expiry', () => {
      ctx.engine.handle(press(key('W')));
      vi.advanceTimersByTime(1000);
      ctx.engine.handle(release(key('W')));

      expect(ctx.vest.calls).toEqual([[5, 0.8, 1000]]);
    });
  });

  describe('overlapping playbacks', () => {
    it('sends the maximum intensity and falls back when the top expires', () => {
      addDiscrete(ctx, 'soft', [step(7, 0.4, 0, 200)]);
      addDiscrete(ctx, 'hard', [step(7, 0.7, 0, 100)]);
      bind(ctx, { input: key('A'), preset: 'soft', mode: 'on-press' });
      bind(ctx, { input: key('B'), preset: 'hard', mode: 'on-press' });

      ctx.engine.handle(press(key('A')));
      vi.advanceTimersByTime(50);
      ctx.engine.handle(press(key('B')));
      vi.advanceTimersByTime(100);

      expect(ctx.vest.calls).toEqual([
        [7, 0.4, 200],
        [7, 0.7, 100],
        [7, 0.4, 50],
      ]);

      vi.advanceTimersByTime(50);
      expect(ctx.vest.calls).toHaveLength(3);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
    });

    it('sends nothing extra for a weaker overlapping claim', () => {
      addDiscrete(ctx, 'hard', [step(7, 0.7, 0, 200)]);
      addDiscrete(ctx, 'soft', [step(7, 0.4, 0, 100)]);
      bind(ctx, { input: key('A'), preset: 'hard', mode: 'on-press' });
      bind(ctx, { input: key('B'), preset: 'soft', mode: 'on-press' });

      ctx.engine.handle(press(key('A')));
      vi.advanceTimersByTime(50);
      ctx.engine.handle(press(key('B')));
      vi.advanceTimersByTime(200);

      expect(ctx.vest.calls).toEqual([[7, 0.7, 200]]);
    });

    it('re-sends the remaining claim when the top one is cancelled', () => {
      addDiscrete(ctx, 'soft', [step(7, 0.4, 0, 500)]);
      addDiscrete(ctx, 'hard', [step(7, 0.7, 0, 1000)]);
      bind(ctx, { input: key('A'), preset: 'soft', mode: 'on-press' });
      bind(ctx, { input: key('B'), preset: 'hard', mode: 'while-held' });

      ctx.engine.handle(press(key('A')));
      vi.advanceTimersByTime(100);
      ctx.engine.handle(press(key('B')));
      vi.advanceTimersByTime(100);
      ctx.engine.handle(release(key('B')));

      expect(ctx.vest.calls).toEqual([
        [7, 0.4, 500],
        [7, 0.7, 1000],
        [7, 0.4, 300],
      ]);
    });
  });

  describe('continuous-axis', () => {
    beforeEach(() => {
      addStickMapping(ctx);
      bind(ctx, { input: stick(0), preset: 'lean', mode: 'continuous-axis' });
    });

    it('maps and sends every axis change immediately', () => {
      ctx.engine.handle(move(stick(0), 0.5));
      ctx.engine.handle(move(stick(0), -1));

      expect(ctx.axis.calls).toEqual([
        ['left_stick_x', 0.5],
        ['left_stick_x', -1],
      ]);
      expect(ctx.engine.getDeviceState().axes).toEqual({ left_stick_x: -1 });
    });

    it('lets the last writer win when two inputs drive one axis', () => {
      bind(ctx, { input: stick(1), preset: 'lean', mode: 'continuous-axis' });

      ctx.engine.handle(move(stick(0), 0.5));
      ctx.engine.handle(move(stick(1), -0.25));

      expect(ctx.engine.getDeviceState().axes).toEqual({ left_stick_x: -0.25 });
    });

    it('ignores press events on axis bindings', () => {
      ctx.engine.handle(press(stick(0)));
      expect(ctx.axis.calls).toEqual([]);
      expect(ctx.vest.calls).toEqual([]);
    });

    it('re-sends the last axis values on keep-alive', async () => {
      await ctx.engine.shutdown();
      ctx = setup({ axisKeepAliveMs: 100 });
      addStickMapping(ctx);
      bind(ctx, { input: stick(0), preset: 'lean', mode: 'continuous-axis' });

      ctx.engine.handle(move(stick(0), 0.5));
      vi.advanceTimersByTime(200);

      expect(ctx.axis.calls).toEqual([
        ['left_stick_x', 0.5],
        ['left_stick_x', 0.5],
        ['left_stick_x', 0.5],
      ]);
    });
  });

  describe('axis-intensity', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'engine', [step(6, 1, 0, 50)]);
      bind(ctx, { input: stick(1), preset: 'engine', mode: 'axis-intensity' });
    });

    it('replays the preset scaled by the deflection until the axis rests', () => {
      ctx.engine.handle(move(stick(1), 0.5));
      expect(ctx.vest.calls).toEqual([[6, 0.5, 50]]);

      vi.advanceTimersByTime(100);
      expect(ctx.vest.calls).toEqual([
        [6, 0.5, 50],
        [6, 0.5, 50],
      ]);

      vi.advanceTimersByTime(20);
      ctx.engine.handle(move(stick(1), 1));
      vi.advanceTimersByTime(80);
      expect(ctx.vest.calls[2]).toEqual([6, 0.9, 50]);

      vi.advanceTimersByTime(20);
      ctx.engine.handle(move(stick(1), 0.02));
      vi.advanceTimersByTime(200);

      expect(ctx.vest.calls).toHaveLength(3);
      expect(ctx.engine.getStats().pendingTasks).toBe(0);
    });

    it('plays nothing for deflections under the floor', () => {
      ctx.engine.handle(move(stick(1), 0.03));
      vi.advanceTimersByTime(300);

      expect(ctx.vest.calls).toEqual([]);
      expect(ctx.axis.calls).toEqual([]);
    });
  });

  describe('device failures', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'reload', [step(2, 0.6, 0, 150)]);
      bind(ctx, { input: key('R'), preset: 'reload', mode: 'on-press' });
    });

    it('reports an unreachable vest once per preset and cancels the playback', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      ctx.vest.respond = () => false;

      ctx.engine.handle(press(key('R')));
      ctx.engine.handle(release(key('R')));
      ctx.engine.handle(press(key('R')));

      expect(ctx.vest.calls).toEqual([
        [2, 0.6, 150],
        [2, 0.6, 150],
      ]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toContain('BR_ERR_DEVICE_UNREACHABLE');
      expect(ctx.events.filter((e) => e.type === 'device-unreachable')).toEqual([
        { type: 'device-unreachable', presetRef: 'reload', target: 'vest' },
      ]);
      expect(ctx.events.filter((e) => e.type === 'playback-ended').map((e) => e.type === 'playback-ended' && e.reason)).toEqual([
        'failed',
        'failed',
      ]);
    });

    it('never throws when the sink throws', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      ctx.vest.respond = () => {
        throw new Error('runtime offline');
      };

      expect(() => ctx.engine.handle(press(key('R')))).not.toThrow();
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
    });

    it('handles asynchronous rejections', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      ctx.vest.respond = () => Promise.reject(new Error('socket closed'));

      ctx.engine.handle(press(key('R')));
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);

      await flushMicrotasks();

      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
      expect(ctx.events.at(-1)).toMatchObject({ type: 'playback-ended', reason: 'failed' });
    });

    it('does not send a stop for claims of a failed playback', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      addDiscrete(ctx, 'sweep', [step(0, 1, 0, 300), step(1, 1, 100, 100)]);
      bind(ctx, { input: key('S'), preset: 'sweep', mode: 'on-press' });
      ctx.vest.respond = () => ctx.vest.calls.length < 2;

      ctx.engine.handle(press(key('S')));
      vi.advanceTimersByTime(300);

      expect(ctx.vest.calls).toEqual([
        [0, 1, 300],
        [1, 1, 100],
      ]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);
    });

    it('tries the device again on the next trigger', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      ctx.vest.respond = () => false;
      ctx.engine.handle(press(key('R')));
      ctx.engine.handle(release(key('R')));

      ctx.vest.respond = () => true;
      ctx.engine.handle(press(key('R')));

      expect(ctx.vest.calls).toHaveLength(2);
      expect(ctx.engine.livePlaybacks()).toHaveLength(1);
    });
  });

  describe('preset deletion', () => {
    it('refuses to delete a preset that is still playing', () => {
      addDiscrete(ctx, 'reload', [step(2, 0.6, 0, 150)]);
      bind(ctx, { input: key('R'), preset: 'reload', mode: 'on-press' });
      ctx.engine.handle(press(key('R')));
      ctx.bindings.remove(key('R'));

      let caught: unknown;
      try {
        ctx.catalog.delete('reload');
      } catch (err) {
        caught = err;
      }
      expect(isBridgeError(caught, 'BR_ERR_PRESET_IN_USE')).toBe(true);

      vi.advanceTimersByTime(150);
      ctx.catalog.delete('reload');
      expect(ctx.catalog.has('reload')).toBe(false);
    });
  });

  describe('pause and resume', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'rumble', [step(5, 0.8, 0, 1000)]);
      bind(ctx, { input: key('W'), preset: 'rumble', mode: 'while-held' });
      addStickMapping(ctx);
      bind(ctx, { input: stick(0), preset: 'lean', mode: 'continuous-axis' });
    });

    it('cancels live playbacks and fires nothing while paused', () => {
      ctx.engine.handle(press(key('W')));
      vi.advanceTimersByTime(100);
      ctx.engine.pause();

      expect(ctx.vest.calls).toEqual([
        [5, 0.8, 1000],
        [5, 0, 0],
      ]);
      expect(ctx.engine.livePlaybacks()).toHaveLength(0);

      ctx.engine.handle(release(key('W')));
      ctx.engine.handle(press(key('W')));
      expect(ctx.vest.calls).toHaveLength(2);
      expect(ctx.engine.isPaused()).toBe(true);
    });

    it('keeps axis values while paused and re-sends them on resume', () => {
      ctx.engine.pause();
      ctx.engine.handle(move(stick(0), 0.5));

      expect(ctx.axis.calls).toEqual([]);
      expect(ctx.engine.getDeviceState().axes).toEqual({ left_stick_x: 0.5 });

      ctx.engine.resume();
      expect(ctx.axis.calls).toEqual([['left_stick_x', 0.5]]);
      expect(ctx.engine.isPaused()).toBe(false);
    });

    it('tracks held state across a pause', () => {
      ctx.engine.pause();
      ctx.engine.handle(press(key('W')));
      ctx.engine.resume();

      expect(ctx.engine.isHeld('key:W')).toBe(true);
      ctx.engine.handle(press(key('W')));
      expect(ctx.vest.calls).toEqual([]);
    });
  });

  describe('binding toggles', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'shot', [step(0, 1, 0, 50)]);
      addDiscrete(ctx, 'alt', [step(1, 1, 0, 50)]);
    });

    it('applies disables and enables lists when a binding fires', () => {
      bind(ctx, { input: key('1'), preset: 'shot', mode: 'on-press', name: 'primary', disables: ['secondary'] });
      bind(ctx, { input: key('2'), preset: 'alt', mode: 'on-press', name: 'secondary' });
      bind(ctx, { input: key('3'), preset: 'shot', mode: 'on-press', enables: ['secondary'] });

      ctx.engine.handle(press(key('1')));
      ctx.engine.handle(press(key('2')));
      expect(ctx.vest.calls).toEqual([[0, 1, 50]]);
      expect(ctx.engine.isBindingEnabled('secondary')).toBe(false);

      vi.advanceTimersByTime(50);
      ctx.engine.handle(press(key('3')));
      ctx.engine.handle(release(key('2')));
      ctx.engine.handle(press(key('2')));

      expect(ctx.vest.calls).toEqual([
        [0, 1, 50],
        [0, 1, 50],
        [1, 1, 50],
      ]);
      expect(ctx.events.filter((e) => e.type === 'binding-toggled')).toEqual([
        { type: 'binding-toggled', bindingId: 'secondary', enabled: false },
        { type: 'binding-toggled', bindingId: 'secondary', enabled: true },
      ]);
    });

    it('starts bindings disabled when asked', () => {
      bind(ctx, { input: key('2'), preset: 'alt', mode: 'on-press', startDisabled: true });

      ctx.engine.handle(press(key('2')));

      expect(ctx.vest.calls).toEqual([]);
      expect(ctx.engine.isBindingEnabled('key:2')).toBe(false);

      ctx.engine.setBindingEnabled('key:2', true);
      ctx.engine.handle(release(key('2')));
      ctx.engine.handle(press(key('2')));
      expect(ctx.vest.calls).toEqual([[1, 1, 50]]);
    });
  });

  describe('hold and repeat', () => {
    beforeEach(() => {
      addDiscrete(ctx, 'pulse', [step(1, 0.5, 0, 50)]);
    });

    it('fires only after the input has been held for holdMs', () => {
      bind(ctx, { input: key('H'), preset: 'pulse', mode: 'on-press', holdMs: 300 });

      ctx.engine.handle(press(key('H')));
      vi.advanceTimersByTime(299);
      expect(ctx.vest.calls).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(ctx.vest.calls).toEqual([[1, 0.5, 50]]);
    });

    it('fires nothing when released before holdMs', () => {
      bind(ctx, { input: key('H'), preset: 'pulse', mode: 'on-press', holdMs: 300 });

      ctx.engine.handle(press(key('H')));
      vi.advanceTimersByTime(100);
      ctx.engine.handle(release(key('H')));
      vi.advanceTimersByTime(500);

      expect(ctx.vest.calls).toEqual([]);
    });

    it('re-fires every repeatMs while held', () => {
      bind(ctx, { input: key('F'), preset: 'pulse', mode: 'on-press', repeatMs: 100 });

      ctx.engine.handle(press(key('F')));
      vi.advanceTimersByTime(250);
      ctx.engine.handle(release(key('F')));
      vi.advanceTimersByTime(500);

      expect(ctx.vest.calls).toEqual([
        [1, 0.5, 50],
        [1, 0.5, 50],
        [1, 0.5, 50],
      ]);
    });
  });

  describe('shutdown', () => {
    it('cancels playbacks and releases the sinks', async () => {
      addDiscrete(ctx, 'rumble', [step(5, 0.8, 0, 1000)]);
      bind(ctx, { input: key('W'), preset: 'rumble', mode: 'on-press' });
      ctx.engine.handle(press(key('W')));

      await ctx.engine.shutdown();

      expect(ctx.vest.calls).toEqual([
        [5, 0.8, 1000],
        [5, 0, 0],
      ]);
      expect(ctx.vest.stopAll).toHaveBeenCalledTimes(1);
      expect(ctx.axis.stopAll).toHaveBeenCalledTimes(1);
      expect(ctx.vest.close).toHaveBeenCalledTimes(1);
      expect(ctx.axis.close).toHaveBeenCalledTimes(1);

      ctx.engine.handle(release(key('W')));
      ctx.engine.handle(press(key('W')));
      expect(ctx.vest.calls).toHaveLength(2);
    });

    it('logs latency stats of the session', async () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});
      bridgeLogger.setEnabled(true);
      try {
        ctx.engine.handle(press(key('Q')));
        await ctx.engine.shutdown();
      } finally {
        bridgeLogger.setEnabled(false);
      }

      const messages = info.mock.calls.map((call) => call[0]);
      expect(messages).toContainEqual(expect.stringMatching(/^\[HapticBridge\] \[LatencyMetrics\] count=1 min=/));
      expect(messages[messages.length - 1]).toBe('[HapticBridge] Dispatch engine shut down');
    });
  });

  describe('getStats', () => {
    it('counts handled events in the latency metrics', () => {
      addDiscrete(ctx, 'reload', [step(2, 0.6, 0, 150)]);
      bind(ctx, { input: key('R'), preset: 'reload', mode: 'on-press' });

      ctx.engine.handle(press(key('R')));
      ctx.engine.handle(release(key('R')));

      const stats = ctx.engine.getStats();
      expect(stats.latency.count).toBe(2);
      expect(stats.livePlaybacks).toBe(1);
      expect(stats.heldInputs).toBe(0);
      expect(ctx.engine.getMetrics().getStats('press').count).toBe(1);
    });
  });
});
