/**
 * Viewer Configuration
 *
 * Validated configuration consumed by the reader core. Nothing here is read
 * from disk: the surrounding application passes overrides (from its settings
 * store or CLI), and `LECTERN_*` environment variables sit between those and
 * the defaults.
 *
 * Image quality presets mirror the settings menu: a preset fixes both the
 * rasterization pixel cap and the transmission budget unless either is given
 * explicitly.
 */

import { z } from 'zod';
import { ConfigError } from '../reader/renderer/errors';

export type ImageQuality = 'fast' | 'balanced' | 'sharp';
export type TextDisplayMode = 'raw' | 'wrap' | 'reflow';

export const IMAGE_QUALITY_PRESETS: Record<ImageQuality, { maxRenderPixels: number; maxTransmitPixels: number }> = {
  fast: { maxRenderPixels: 2_000_000, maxTransmitPixels: 1_000_000 },
  balanced: { maxRenderPixels: 4_000_000, maxTransmitPixels: 2_000_000 },
  sharp: { maxRenderPixels: 8_000_000, maxTransmitPixels: 4_000_000 },
};

const zoomSchema = z
  .object({
    min: z.number().int().positive().default(50),
    max: z.number().int().positive().default(400),
    step: z.number().int().positive().default(25),
    default: z.number().int().positive().default(100),
  })
  .default({})
  .refine((zoom) => zoom.min <= zoom.max, { message: 'zoom.min must not exceed zoom.max' })
  .refine((zoom) => zoom.default >= zoom.min && zoom.default <= zoom.max, {
    message: 'zoom.default must lie within [zoom.min, zoom.max]',
  });

const textSchema = z
  .object({
    mode: z.enum(['raw', 'wrap', 'reflow']).default('reflow'),
    furnitureSampleDepth: z.number().int().min(1).max(50).default(5),
    furnitureMajority: z.number().gt(0).lt(1).default(0.5),
    wordSpaceThreshold: z.number().max(0).default(-200),
    lineBreakTolerance: z.number().nonnegative().default(2),
    trimHeadersFooters: z.boolean().default(true),
  })
  .default({});

const configSchema = z.object({
  imageQuality: z.enum(['fast', 'balanced', 'sharp']).default('balanced'),
  maxRenderPixels: z.number().int().positive().optional(),
  maxTransmitPixels: z.number().int().positive().optional(),
  maxRenderDimension: z.number().int().min(16).max(16384).default(8192),
  cacheCapacity: z.number().int().min(1).max(16).default(3),
  zoom: zoomSchema,
  text: textSchema,
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  logFile: z.string().min(1).optional(),
});

export type ViewerConfigInput = z.input<typeof configSchema>;

export type ViewerConfig = Omit<z.output<typeof configSchema>, 'maxRenderPixels' | 'maxTransmitPixels'> & {
  maxRenderPixels: number;
  maxTransmitPixels: number;
};

export type ZoomConfig = ViewerConfig['zoom'];
export type TextConfig = ViewerConfig['text'];

/**
 * Environment variables understood by `loadViewerConfig`.
 */
const ENV_KEYS = {
  LECTERN_IMAGE_QUALITY: 'imageQuality',
  LECTERN_MAX_TRANSMIT_PIXELS: 'maxTransmitPixels',
  LECTERN_MAX_RENDER_PIXELS: 'maxRenderPixels',
  LECTERN_CACHE_CAPACITY: 'cacheCapacity',
  LECTERN_LOG_LEVEL: 'logLevel',
  LECTERN_LOG_FILE: 'logFile',
} as const;

const NUMERIC_ENV_KEYS = new Set<string>(['maxTransmitPixels', 'maxRenderPixels', 'cacheCapacity']);

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    out[configKey] = NUMERIC_ENV_KEYS.has(configKey) ? Number(raw.trim()) : raw.trim();
  }
  return out;
}

/**
 * Merge defaults, environment and overrides, then validate.
 *
 * @throws ConfigError listing every failing path
 */
export function loadViewerConfig(
  overrides: ViewerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ViewerConfig {
  const merged = { ...readEnv(env), ...overrides };
  const result = configSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    const summary = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid viewer configuration: ${summary}`, issues);
  }

  const parsed = result.data;
  const preset = IMAGE_QUALITY_PRESETS[parsed.imageQuality];
  return {
    ...parsed,
    maxRenderPixels: parsed.maxRenderPixels ?? preset.maxRenderPixels,
    maxTransmitPixels: parsed.maxTransmitPixels ?? preset.maxTransmitPixels,
  };
}

export function defaultViewerConfig(): ViewerConfig {
  return loadViewerConfig({}, {});
}
