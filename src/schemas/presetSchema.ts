/**
 * Zod Schemas for Presets, Bindings and State Snapshots
 *
 * Everything the editor UI or a config file hands to the catalog and the
 * binding store passes through these schemas. Unknown fields are stripped,
 * so older builds can read snapshots written by newer ones.
 *
 * @module schemas/presetSchema
 */

import { z } from 'zod';
import {
  ACTIVATION_MODES,
  GAMEPAD_AXES,
  MOUSE_BUTTONS,
  VEST_NODE_COUNT,
} from '../core/types';
import { clamp01 } from '../utils/math';

// ============ Inputs ============

const DeviceIndexSchema = z.number().int().min(0).optional();

/**
 * Logical input (key code names are upper-cased)
 */
export const LogicalInputSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('key'),
    code: z.string().min(1).transform((code) => code.toUpperCase()),
  }),
  z.object({
    kind: z.literal('mouse-button'),
    code: z.enum(MOUSE_BUTTONS),
  }),
  z.object({
    kind: z.literal('joystick-button'),
    code: z.number().int().min(0),
    deviceIndex: DeviceIndexSchema,
  }),
  z.object({
    kind: z.literal('joystick-axis'),
    code: z.number().int().min(0),
    deviceIndex: DeviceIndexSchema,
  }),
]);

// ============ Discrete Patterns (vest) ============

/**
 * One timed node activation. Intensity is clamped, not rejected.
 */
export const StimulusStepSchema = z.object({
  nodeId: z.number().int().min(0).max(VEST_NODE_COUNT - 1),
  intensity: z.number().finite().transform(clamp01),
  startOffsetMs: z.number().finite().min(0),
  durationMs: z.number().finite().min(0),
});

export const DiscretePatternSchema = z.object({
  kind: z.literal('discrete'),
  steps: z.array(StimulusStepSchema).min(1),
});

// ============ Continuous Mappings (chair / gamepad) ============

export const AxisCurveSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('linear') }),
  z.object({ type: z.literal('exponential'), exponent: z.number().finite().positive() }),
  z.object({
    type: z.literal('points'),
    points: z.array(z.tuple([z.number().finite(), z.number().min(-1).max(1)])).min(2),
  }),
]);

export const ContinuousMappingSchema = z.object({
  kind: z.literal('continuous'),
  axisId: z.enum(GAMEPAD_AXES),
  deadzone: z.number().min(0).lt(1).default(0.05),
  curve: AxisCurveSchema.default({ type: 'linear' }),
  direction: z.enum(['both', 'positive', 'negative']).default('both'),
  /** Input magnitude that already yields full output (0-1] */
  saturation: z.number().gt(0).max(1).default(1),
  maxOutput: z.number().min(0).max(1).default(1),
  invert: z.boolean().default(false),
});

export const PresetPatternSchema = z.discriminatedUnion('kind', [
  DiscretePatternSchema,
  ContinuousMappingSchema,
]);

// ============ Preset ============

export const PresetSchema = z
  .object({
    ref: z.string().min(1),
    label: z.string().optional(),
    pattern: PresetPatternSchema,
  })
  .superRefine((preset, ctx) => {
    const { pattern } = preset;

    if (pattern.kind === 'discrete') {
      for (let i = 1; i < pattern.steps.length; i++) {
        const prev = pattern.steps[i - 1].startOffsetMs;
        if (pattern.steps[i].startOffsetMs < prev) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['pattern', 'steps', i, 'startOffsetMs'],
            message: `startOffsetMs must not be less than the previous step (${prev})`,
          });
        }
      }
      return;
    }

    if (pattern.curve.type !== 'points') return;

    const points = pattern.curve.points;
    if (points[0][0] !== -1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern', 'curve', 'points', 0],
        message: 'curve must start at x = -1',
      });
    }
    if (points[points.length - 1][0] !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern', 'curve', 'points', points.length - 1],
        message: 'curve must end at x = 1',
      });
    }
    for (let i = 1; i < points.length; i++) {
      if (points[i][0] <= points[i - 1][0]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pattern', 'curve', 'points', i],
          message: 'curve x values must be strictly increasing',
        });
      }
    }
  });

// ============ Binding ============

/**
 * Axis-driven vest effects: the axis deflection sets the intensity of a
 * discrete preset that is replayed while the axis stays out of rest.
 */
export const AxisIntensitySchema = z.object({
  direction: z.enum(['both', 'positive', 'negative']).default('both'),
  /** Deflections beyond this are treated as this */
  inputCeiling: z.number().gt(0).max(1).default(0.9),
  /** Deflection (after the ceiling) that already yields full intensity */
  saturation: z.number().gt(0).max(1).default(1),
  maxIntensity: z.number().min(0).max(1).default(1),
  /** Levels below this play nothing */
  floor: z.number().min(0).max(1).default(0.05),
  replayMs: z.number().int().min(10).default(100),
});

export const DEFAULT_AXIS_INTENSITY = AxisIntensitySchema.parse({});

export const BindingSchema = z.object({
  input: LogicalInputSchema,
  preset: z.string().min(1),
  mode: z.enum(ACTIVATION_MODES),
  /** Target name for other bindings' enables/disables lists */
  name: z.string().min(1).optional(),
  holdMs: z.number().int().min(0).default(0),
  repeatMs: z.number().int().min(0).default(0),
  startDisabled: z.boolean().default(false),
  enables: z.array(z.string().min(1)).default([]),
  disables: z.array(z.string().min(1)).default([]),
  /** Shaping for axis-intensity bindings; defaults apply when absent */
  axisIntensity: AxisIntensitySchema.optional(),
});

// ============ Snapshot ============

export const SNAPSHOT_VERSION = 1;

export const StateSnapshotSchema = z.object({
  version: z.number().int().min(1),
  presets: z.record(z.string(), PresetSchema),
  bindings: z.record(z.string(), BindingSchema),
});

// ============ Type Inference ============

export type StimulusStep = z.infer<typeof StimulusStepSchema>;
export type DiscretePattern = z.infer<typeof DiscretePatternSchema>;
export type AxisCurve = z.infer<typeof AxisCurveSchema>;
export type ContinuousMapping = z.infer<typeof ContinuousMappingSchema>;
export type PresetPattern = z.infer<typeof PresetPatternSchema>;
export type Preset = z.infer<typeof PresetSchema>;
export type PresetInput = z.input<typeof PresetSchema>;
export type AxisIntensity = z.infer<typeof AxisIntensitySchema>;
export type Binding = z.infer<typeof BindingSchema>;
export type BindingInput = z.input<typeof BindingSchema>;
export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

// ============ Validation Helpers ============

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: z.ZodError;
  issues?: string[];
}

function toValidationResult<I, T>(
  result: z.SafeParseReturnType<I, T>
): ValidationResult<T> {
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: result.error,
    issues: result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    ),
  };
}

/**
 * Validate a preset with detailed error reporting.
 */
export function validatePreset(data: unknown): ValidationResult<Preset> {
  return toValidationResult(PresetSchema.safeParse(data));
}

export function validateBinding(data: unknown): ValidationResult<Binding> {
  return toValidationResult(BindingSchema.safeParse(data));
}

export function validateSnapshot(data: unknown): ValidationResult<StateSnapshot> {
  return toValidationResult(StateSnapshotSchema.safeParse(data));
}
