// Deep Sea Adventure - Session Configuration

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { ConfigurationError } from './errors.js';
import { seedFromHex } from './random.js';
import { DEFAULT_TIERS, validateTiers } from './treasure-deck.js';
import { DEFAULT_OXYGEN_MAX, MAX_DIVERS, MIN_DIVERS } from './types.js';

// =============================================================================
// Schema
// =============================================================================

const diverSchema = z.union([
  z
    .string()
    .min(1)
    .transform(id => ({ id, name: id })),
  z
    .object({
      id: z.string().min(1),
      name: z.string().min(1).optional(),
    })
    .transform(d => ({ id: d.id, name: d.name ?? d.id })),
]);

const tierSchema = z.object({
  tier: z.number().int().positive(),
  depth: z.number().int().positive(),
  values: z.array(z.number().int().nonnegative()).min(1),
});

export const sessionConfigSchema = z
  .object({
    divers: z.array(diverSchema).min(MIN_DIVERS).max(MAX_DIVERS),
    oxygenMax: z.number().int().positive().default(DEFAULT_OXYGEN_MAX),
    tiers: z
      .array(tierSchema)
      .min(1)
      .default(() => DEFAULT_TIERS.map(t => ({ ...t, values: [...t.values] }))),
    highTierThreshold: z.number().int().positive().optional(),
    weightSlowsMovement: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.divers.forEach((diver, index) => {
      if (seen.has(diver.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate diver id "${diver.id}"`,
          path: ['divers', index],
        });
      }
      seen.add(diver.id);
    });

    if (config.highTierThreshold !== undefined && config.highTierThreshold > config.tiers.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `High tier threshold ${config.highTierThreshold} exceeds the deepest tier (${config.tiers.length})`,
        path: ['highTierThreshold'],
      });
    }
  })
  .transform(config => ({
    ...config,
    highTierThreshold: config.highTierThreshold ?? config.tiers.length,
  }));

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = z.output<typeof sessionConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validates raw configuration and fills in defaults.
 * @throws ConfigurationError listing every schema problem, or the first deck problem
 */
export function parseSessionConfig(input: unknown): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('INVALID_CONFIG', fromZodError(result.error).message);
  }

  validateTiers(result.data.tiers);
  return result.data;
}

function parseFlag(value: string | undefined): boolean | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Builds a session config from environment variables:
 * DSA_DIVERS (comma-separated ids), DSA_OXYGEN_MAX, DSA_HIGH_TIER_THRESHOLD
 * and DSA_WEIGHT_SLOWS_MOVEMENT.
 */
export function loadSessionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const divers = env.DSA_DIVERS?.split(',')
    .map(id => id.trim())
    .filter(id => id.length > 0);

  return parseSessionConfig({
    divers,
    oxygenMax: parseNumber(env.DSA_OXYGEN_MAX),
    highTierThreshold: parseNumber(env.DSA_HIGH_TIER_THRESHOLD),
    weightSlowsMovement: parseFlag(env.DSA_WEIGHT_SLOWS_MOVEMENT),
  });
}

/**
 * Reads DSA_SEED (64 hex characters) if set.
 */
export function loadSeedFromEnv(env: NodeJS.ProcessEnv = process.env): Uint8Array | undefined {
  const hex = env.DSA_SEED?.trim();
  if (!hex) {
    return undefined;
  }
  try {
    return seedFromHex(hex);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('INVALID_CONFIG', `DSA_SEED: ${reason}`);
  }
}
