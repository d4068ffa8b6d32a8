/**
 * Config File - settings and snapshot persisted as one JSON document
 *
 * Loading never fails: a missing file yields defaults, a broken one yields
 * defaults plus a BR_ERR_CONFIG_LOAD_FAILED warning. Saving throws
 * BR_ERR_CONFIG_SAVE_FAILED.
 *
 * @module project/configFile
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { StateSnapshot } from '../core/types';
import type { BridgeSettings } from '../schemas/settingsSchema';
import { resolveSettings } from '../schemas/settingsSchema';
import { SNAPSHOT_VERSION } from '../schemas/presetSchema';
import { createBridgeError, isBridgeError, logBridgeError } from '../core/bridgeErrors';
import { bridgeLogger } from '../core/bridgeLogger';
import { parseSnapshot } from './stateSnapshot';

export const DEFAULT_CONFIG_FILENAME = 'haptic-bridge.json';

/** On-disk shape; each section is validated on its own */
const ConfigFileSchema = z.object({
  settings: z.unknown().optional(),
  snapshot: z.unknown().optional(),
});

export interface LoadedConfig {
  settings: BridgeSettings;
  snapshot: StateSnapshot;
  /** false when defaults were used because the file was missing or broken */
  fromFile: boolean;
}

export function emptySnapshot(): StateSnapshot {
  return { version: SNAPSHOT_VERSION, presets: {}, bindings: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load settings (with environment overrides applied) and the snapshot
 */
export async function loadConfigFile(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      bridgeLogger.info(`No config at ${path}, using defaults`);
    } else {
      logBridgeError('BR_ERR_CONFIG_LOAD_FAILED', `${path}: ${describeError(err)}`);
    }
    return { settings: resolveSettings({}, env), snapshot: emptySnapshot(), fromFile: false };
  }

  let raw: z.infer<typeof ConfigFileSchema>;
  try {
    raw = ConfigFileSchema.parse(JSON.parse(text));
  } catch (err) {
    logBridgeError('BR_ERR_CONFIG_LOAD_FAILED', `${path}: ${describeError(err)}`);
    return { settings: resolveSettings({}, env), snapshot: emptySnapshot(), fromFile: false };
  }

  const settings = resolveSettings(raw.settings ?? {}, env);

  let snapshot = emptySnapshot();
  if (raw.snapshot !== undefined) {
    try {
      snapshot = parseSnapshot(raw.snapshot);
    } catch (err) {
      const details = isBridgeError(err) ? err.message : describeError(err);
      logBridgeError('BR_ERR_CONFIG_LOAD_FAILED', `${path}: ${details}`);
    }
  }

  bridgeLogger.info(
    `Loaded ${Object.keys(snapshot.presets).length} presets and ${Object.keys(snapshot.bindings).length} bindings from ${path}`
  );
  return { settings, snapshot, fromFile: true };
}

/**
 * Write settings and snapshot. The file is replaced atomically.
 */
export async function saveConfigFile(
  path: string,
  settings: BridgeSettings,
  snapshot: StateSnapshot
): Promise<void> {
  const body = `${JSON.stringify({ settings, snapshot }, null, 2)}\n`;
  const tmpPath = `${path}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, body, 'utf8');
    await rename(tmpPath, path);
  } catch (err) {
    throw createBridgeError('BR_ERR_CONFIG_SAVE_FAILED', `${path}: ${describeError(err)}`);
  }

  bridgeLogger.verbose(`Config saved to ${path}`);
}
