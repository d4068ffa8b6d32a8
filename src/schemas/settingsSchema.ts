/**
 * Zod Schema for Bridge Settings
 *
 * Engine tuning with defaults. Values come from the config file, then
 * HAPTIC_BRIDGE_* environment variables override them.
 *
 * @module schemas/settingsSchema
 */

import { z } from 'zod';

export const BridgeSettingsSchema = z.object({
  /** Axis changes smaller than this are dropped by the input listener */
  axisEpsilon: z.number().min(0).max(1).default(0.01),
  /** Input poll tick */
  pollIntervalMs: z.number().int().positive().default(20),
  /** Scales every vest intensity */
  masterIntensity: z.number().min(0).max(1).default(1),
  /** Re-send last axis values at this interval (0 = off) */
  axisKeepAliveMs: z.number().int().min(0).default(0),
  logLevel: z.enum(['verbose', 'normal', 'errors']).default('normal'),
  debug: z.boolean().default(false),
});

export type BridgeSettings = z.infer<typeof BridgeSettingsSchema>;
export type BridgeSettingsInput = z.input<typeof BridgeSettingsSchema>;

const ENV_PREFIX = 'HAPTIC_BRIDGE_';

/**
 * Environment overrides. Unset or empty variables are skipped.
 */
const EnvOverridesSchema = z.object({
  axisEpsilon: z.coerce.number().optional(),
  pollIntervalMs: z.coerce.number().optional(),
  masterIntensity: z.coerce.number().optional(),
  axisKeepAliveMs: z.coerce.number().optional(),
  logLevel: z.string().optional(),
  debug: z
    .string()
    .transform((value) => value === 'true' || value === '1')
    .optional(),
});

const ENV_KEYS: Record<keyof z.infer<typeof EnvOverridesSchema>, string> = {
  axisEpsilon: `${ENV_PREFIX}AXIS_EPSILON`,
  pollIntervalMs: `${ENV_PREFIX}POLL_INTERVAL_MS`,
  masterIntensity: `${ENV_PREFIX}MASTER_INTENSITY`,
  axisKeepAliveMs: `${ENV_PREFIX}AXIS_KEEPALIVE_MS`,
  logLevel: `${ENV_PREFIX}LOG_LEVEL`,
  debug: `${ENV_PREFIX}DEBUG`,
};

export function getDefaultSettings(): BridgeSettings {
  return BridgeSettingsSchema.parse({});
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse settings, falling back to defaults field by field.
 */
export function parseSettingsWithDefaults(data: unknown): BridgeSettings {
  const full = BridgeSettingsSchema.safeParse(data ?? {});
  if (full.success) return full.data;

  console.warn('[SettingsSchema] Invalid settings, using defaults for:', full.error.issues.map(
    (issue) => issue.path.join('.')
  ));

  const raw: Record<string, unknown> = isRecord(data) ? data : {};
  const settings = getDefaultSettings();
  for (const key of BridgeSettingsSchema.keyof().options) {
    const single = BridgeSettingsSchema.shape[key].safeParse(raw[key]);
    if (single.success) {
      Object.assign(settings, { [key]: single.data });
    }
  }
  return settings;
}

/**
 * Read HAPTIC_BRIDGE_* overrides from an environment map.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<BridgeSettingsInput> {
  const picked: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') picked[field] = value;
  }

  const parsed = EnvOverridesSchema.safeParse(picked);
  if (!parsed.success) {
    console.warn('[SettingsSchema] Ignoring malformed environment overrides:', parsed.error.issues);
    return {};
  }

  const overrides: Partial<BridgeSettingsInput> = {};
  const d = parsed.data;
  if (d.axisEpsilon !== undefined) overrides.axisEpsilon = d.axisEpsilon;
  if (d.pollIntervalMs !== undefined) overrides.pollIntervalMs = d.pollIntervalMs;
  if (d.masterIntensity !== undefined) overrides.masterIntensity = d.masterIntensity;
  if (d.axisKeepAliveMs !== undefined) overrides.axisKeepAliveMs = d.axisKeepAliveMs;
  if (d.debug !== undefined) overrides.debug = d.debug;
  if (d.logLevel === 'verbose' || d.logLevel === 'normal' || d.logLevel === 'errors') {
    overrides.logLevel = d.logLevel;
  }
  return overrides;
}

/**
 * Merge file settings with environment overrides.
 */
export function resolveSettings(
  fileSettings: unknown,
  env: NodeJS.ProcessEnv = process.env
): BridgeSettings {
  const base = parseSettingsWithDefaults(fileSettings);
  return parseSettingsWithDefaults({ ...base, ...readEnvOverrides(env) });
}
