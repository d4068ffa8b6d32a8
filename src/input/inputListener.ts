/**
 * Input Listener
 *
 * Turns raw keyboard, mouse and joystick events into an ordered stream of
 * InputEvents. Events arrive by push() or from pollers attached with
 * attachPoller(); the stream is consumed once with `for await`.
 *
 * - repeated "down" without an "up" yields one press
 * - an "up" for an input that is not down is dropped
 * - axis moves smaller than axisEpsilon from the last delivered value are
 *   dropped, except moves onto 0 or ±1
 */

import type { InputEvent, LogicalInput } from '../core/types';
import { createBridgeError, logBridgeError } from '../core/bridgeErrors';
import { bridgeLogger } from '../core/bridgeLogger';
import { inputKey } from '../core/logicalInput';
import { clamp } from '../utils/math';
import { toLogicalInput, type RawInputEvent } from './normalize';

// ============ Types ============

/** Polled input source (e.g. a joystick or key-state reader) */
export interface InputPoller {
  /** Human label for logs */
  name?: string;
  /** Acquire the device; a rejection means it is held elsewhere */
  open?(): void | Promise<void>;
  poll(): RawInputEvent[] | Promise<RawInputEvent[]>;
  close?(): void | Promise<void>;
}

export interface InputListenerOptions {
  axisEpsilon?: number;
  pollIntervalMs?: number;
  /** Event timestamp clock (ms) */
  now?: () => number;
}

interface AttachedPoller {
  poller: InputPoller;
  timer: ReturnType<typeof setInterval>;
  busy: boolean;
}

// ============ Listener ============

export class InputListener implements AsyncIterable<InputEvent> {
  private axisEpsilon: number;
  private pollIntervalMs: number;
  private clock: () => number;

  private queue: InputEvent[] = [];
  private waiting: ((result: IteratorResult<InputEvent>) => void) | null = null;
  private iterated: boolean = false;
  private closed: boolean = false;

  /** inputKey of every input currently down */
  private down: Set<string> = new Set();
  /** inputKey -> last delivered axis value */
  private axisValues: Map<string, number> = new Map();
  private pollers: AttachedPoller[] = [];

  constructor(options: InputListenerOptions = {}) {
    this.axisEpsilon = options.axisEpsilon ?? 0.01;
    this.pollIntervalMs = options.pollIntervalMs ?? 20;
    this.clock = options.now ?? (() => Date.now());
  }

  // ============ Sources ============

  /**
   * Feed one raw event
   * @returns true if it produced an InputEvent
   */
  push(raw: RawInputEvent): boolean {
    if (this.closed) return false;

    const input = toLogicalInput(raw);
    if (!input) {
      bridgeLogger.verbose('Ignoring unknown input', raw);
      return false;
    }

    if (raw.source === 'joystick-axis') return this.pushAxis(input, raw.value);
    return this.pushButton(input, raw.down);
  }

  private pushButton(input: LogicalInput, isDown: boolean): boolean {
    const key = inputKey(input);

    if (isDown) {
      if (this.down.has(key)) return false;
      this.down.add(key);
      this.deliver({ input, kind: 'press', value: 1, t: this.clock() });
      return true;
    }

    if (!this.down.delete(key)) return false;
    this.deliver({ input, kind: 'release', value: 0, t: this.clock() });
    return true;
  }

  private pushAxis(input: LogicalInput, raw: number): boolean {
    if (!Number.isFinite(raw)) return false;

    const key = inputKey(input);
    const value = clamp(raw, -1, 1);
    const last = this.axisValues.get(key) ?? 0;

    if (value === last) return false;
    const atRest = value === 0 || value === 1 || value === -1;
    if (!atRest && Math.abs(value - last) < this.axisEpsilon) return false;

    this.axisValues.set(key, value);
    this.deliver({ input, kind: 'axisChange', value, t: this.clock() });
    return true;
  }

  /**
   * Acquire a poller and read it every `intervalMs`.
   * Throws BR_ERR_INPUT_DEVICE_LOCKED when the device cannot be opened.
   * @returns detach function
   */
  async attachPoller(poller: InputPoller, intervalMs: number = this.pollIntervalMs): Promise<() => Promise<void>> {
    const label = poller.name ?? 'input poller';

    try {
      await poller.open?.();
    } catch (err) {
      const error = createBridgeError(
        'BR_ERR_INPUT_DEVICE_LOCKED',
        `${label}: ${err instanceof Error ? err.message : String(err)}`
      );
      logBridgeError(error);
      throw error;
    }

    const attached: AttachedPoller = {
      poller,
      busy: false,
      timer: setInterval(() => this.tick(attached), intervalMs),
    };
    this.pollers.push(attached);
    bridgeLogger.info(`Polling ${label} every ${intervalMs}ms`);

    return () => this.detach(attached);
  }

  private tick(attached: AttachedPoller): void {
    // A slow poll is skipped rather than overlapped
    if (attached.busy || this.closed) return;

    let batch: RawInputEvent[] | Promise<RawInputEvent[]>;
    try {
      batch = attached.poller.poll();
    } catch (err) {
      bridgeLogger.warn(`Poll failed for ${attached.poller.name ?? 'input poller'}:`, err);
      return;
    }

    if (Array.isArray(batch)) {
      for (const raw of batch) this.push(raw);
      return;
    }

    attached.busy = true;
    void batch.then(
      (events) => {
        attached.busy = false;
        for (const raw of events) this.push(raw);
      },
      (err: unknown) => {
        attached.busy = false;
        bridgeLogger.warn(`Poll failed for ${attached.poller.name ?? 'input poller'}:`, err);
      }
    );
  }

  private async detach(attached: AttachedPoller): Promise<void> {
    const index = this.pollers.indexOf(attached);
    if (index === -1) return;

    this.pollers.splice(index, 1);
    clearInterval(attached.timer);
    try {
      await attached.poller.close?.();
    } catch (err) {
      bridgeLogger.warn(`Closing ${attached.poller.name ?? 'input poller'} failed:`, err);
    }
  }

  // ============ Stream ============

  private deliver(event: InputEvent): void {
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: event, done: false });
      return;
    }
    this.queue.push(event);
  }

  [Symbol.asyncIterator](): AsyncIterator<InputEvent> {
    if (this.iterated) {
      throw new Error('InputListener can only be iterated once');
    }
    this.iterated = true;

    return {
      next: () => this.next(),
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<InputEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /** Inputs currently held down */
  heldInputs(): string[] {
    return Array.from(this.down);
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * End the stream after queued events and release every poller
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }

    await Promise.all([...this.pollers].map((attached) => this.detach(attached)));
  }
}
