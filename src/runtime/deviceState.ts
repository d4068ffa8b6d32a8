/**
 * Device State - what the dispatch engine has put on the devices
 *
 * Owned by exactly one DispatchEngine; nothing else mutates it.
 * Tracks live playbacks, every playback's current contribution per vest
 * node, what was last sent to each node, and the last value per output axis.
 */

import type { GamepadAxisId, StimulusStep } from '../core/types';

/** Live instance of a discrete preset */
export interface ActivePlayback {
  id: string;
  presetRef: string;
  /** inputKey of the binding that fired it */
  inputKey: string | null;
  /** Steps copied at fire time; later preset edits do not reach them */
  steps: readonly StimulusStep[];
  startedAt: number;
  endsAt: number;
  /** Master intensity at fire time */
  intensityScale: number;
}

/** One playback's claim on a node until `until` */
export interface NodeContribution {
  playbackId: string;
  presetRef: string;
  intensity: number;
  until: number;
}

/** What the vest was last told for a node */
export interface NodeOutput {
  intensity: number;
  until: number;
}

export class DeviceState {
  private playbacks: Map<string, ActivePlayback> = new Map();
  private contributions: Map<number, NodeContribution[]> = new Map();
  private lastSent: Map<number, NodeOutput> = new Map();
  private axes: Map<GamepadAxisId, number> = new Map();

  // ============ Playbacks ============

  addPlayback(playback: ActivePlayback): void {
    this.playbacks.set(playback.id, playback);
  }

  getPlayback(id: string): ActivePlayback | undefined {
    return this.playbacks.get(id);
  }

  /**
   * Remove a playback and its node contributions
   * @returns nodes whose contributions changed
   */
  removePlayback(id: string): number[] {
    this.playbacks.delete(id);

    const affected: number[] = [];
    for (const [nodeId, list] of this.contributions) {
      const kept = list.filter((c) => c.playbackId !== id);
      if (kept.length === list.length) continue;
      affected.push(nodeId);
      if (kept.length === 0) this.contributions.delete(nodeId);
      else this.contributions.set(nodeId, kept);
    }
    return affected;
  }

  livePlaybacks(): ActivePlayback[] {
    return Array.from(this.playbacks.values());
  }

  get playbackCount(): number {
    return this.playbacks.size;
  }

  isPresetLive(ref: string): boolean {
    for (const playback of this.playbacks.values()) {
      if (playback.presetRef === ref) return true;
    }
    return false;
  }

  // ============ Node Contributions ============

  /**
   * Add a claim; a playback holds at most one claim per node (latest wins)
   */
  addContribution(nodeId: number, contribution: NodeContribution): void {
    const list = (this.contributions.get(nodeId) ?? []).filter(
      (c) => c.playbackId !== contribution.playbackId
    );
    list.push(contribution);
    this.contributions.set(nodeId, list);
  }

  /**
   * Drop claims that ended at or before `now`
   */
  pruneNode(nodeId: number, now: number): void {
    const list = this.contributions.get(nodeId);
    if (!list) return;
    const kept = list.filter((c) => c.until > now);
    if (kept.length === 0) this.contributions.delete(nodeId);
    else this.contributions.set(nodeId, kept);
  }

  /**
   * Strongest claim on a node; ties go to the one lasting longest
   */
  topContribution(nodeId: number): NodeContribution | undefined {
    let top: NodeContribution | undefined;
    for (const c of this.contributions.get(nodeId) ?? []) {
      if (!top || c.intensity > top.intensity || (c.intensity === top.intensity && c.until > top.until)) {
        top = c;
      }
    }
    return top;
  }

  getLastOutput(nodeId: number): NodeOutput | undefined {
    return this.lastSent.get(nodeId);
  }

  setLastOutput(nodeId: number, output: NodeOutput | undefined): void {
    if (output) this.lastSent.set(nodeId, output);
    else this.lastSent.delete(nodeId);
  }

  // ============ Axes ============

  setAxis(axisId: GamepadAxisId, value: number): void {
    this.axes.set(axisId, value);
  }

  getAxis(axisId: GamepadAxisId): number | undefined {
    return this.axes.get(axisId);
  }

  axisEntries(): Array<[GamepadAxisId, number]> {
    return Array.from(this.axes.entries());
  }

  // ============ Lifecycle ============

  /**
   * Snapshot for diagnostics and tests
   */
  describe(): {
    playbacks: string[];
    nodes: Record<number, NodeOutput>;
    axes: Partial<Record<GamepadAxisId, number>>;
  } {
    const nodes: Record<number, NodeOutput> = {};
    for (const [nodeId, output] of this.lastSent) nodes[nodeId] = { ...output };
    return {
      playbacks: Array.from(this.playbacks.keys()),
      nodes,
      axes: Object.fromEntries(this.axes),
    };
  }

  clear(): void {
    this.playbacks.clear();
    this.contributions.clear();
    this.lastSent.clear();
    this.axes.clear();
  }
}
