/**
 * Chain Service Wire Schemas
 *
 * zod schemas for everything the chain service returns. Validation happens at
 * the parse boundary; the records handed to callers are the port types from
 * @subnet-bridge/core/ports.
 */

import { z } from 'zod';
import type {
  KeyringPair,
  ResponseEnvelope,
  SubnetHyperparameters,
  SubnetMetagraph,
} from '@subnet-bridge/core/ports';
import { ProtocolError } from './errors.js';

// --------------------------------------------------------------------------
// Field Helpers
// --------------------------------------------------------------------------

const HEX_PATTERN = /^0x[0-9a-fA-F]+$/;

/**
 * u64 that the service serializes as a 0x-prefixed hex string (difficulty,
 * minDifficulty, maxDifficulty, adjustmentAlpha). Decoded to a bigint; plain
 * numbers are accepted while they are still exact.
 */
export const HexOrIntSchema = z.preprocess((value) => {
  if (typeof value === 'string' && HEX_PATTERN.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  return value;
}, z.bigint().nonnegative());

const RateLimitSchema = z.union([z.number(), z.string()]);

// --------------------------------------------------------------------------
// Envelope
// --------------------------------------------------------------------------

export const ResponseEnvelopeSchema = z
  .object({
    data: z.unknown(),
    error: z.unknown(),
    statusCode: z.number().int().optional(),
    message: z.string().optional().catch(undefined),
  })
  .passthrough();

// --------------------------------------------------------------------------
// Subnet Records
// --------------------------------------------------------------------------

export const SubnetHyperparametersSchema = z.object({
  rho: z.number(),
  kappa: z.number(),
  immunityPeriod: z.number(),
  minAllowedWeights: z.number(),
  maxWeightsLimit: z.number(),
  tempo: z.number(),
  minDifficulty: HexOrIntSchema,
  maxDifficulty: HexOrIntSchema,
  difficulty: HexOrIntSchema,
  weightsVersion: z.number(),
  weightsRateLimit: RateLimitSchema,
  adjustmentInterval: z.number(),
  activityCutoff: z.number(),
  registrationAllowed: z.boolean(),
  targetRegsPerInterval: z.number(),
  minBurn: z.number(),
  maxBurn: z.number(),
  bondsMovingAvg: z.number(),
  maxRegsPerBlock: z.number(),
  servingRateLimit: z.number(),
  maxValidators: z.number(),
  adjustmentAlpha: HexOrIntSchema,
  commitRevealPeriod: z.number(),
  commitRevealWeightsEnabled: z.boolean(),
  alphaHigh: z.number(),
  alphaLow: z.number(),
  liquidAlphaEnabled: z.boolean(),
});

export const AxonInfoSchema = z.object({
  block: z.number(),
  version: z.number(),
  ip: z.string(),
  port: z.number(),
  ipType: z.number(),
  protocol: z.number(),
  placeholder1: z.number(),
  placeholder2: z.number(),
  hotkey: z.string().default(''),
  coldkey: z.string().default(''),
});

export const SubnetIdentitySchema = z.object({
  subnetName: z.string(),
  githubRepo: z.string(),
  subnetContact: z.string(),
  subnetUrl: z.string(),
  discord: z.string(),
  description: z.string(),
  additional: z.string(),
});

export const IdentitiesInfoSchema = z.object({
  name: z.string(),
  url: z.string(),
  githubRepo: z.string(),
  image: z.string(),
  discord: z.string(),
  description: z.string(),
  additional: z.string(),
});

const DividendPairSchema = z.tuple([z.string(), z.number()]);

/** Per-participant fields that must all be `numUids` long */
export const PARTICIPANT_FIELDS = [
  'hotkeys',
  'coldkeys',
  'identities',
  'axons',
  'active',
  'validatorPermit',
  'pruningScore',
  'lastUpdate',
  'emission',
  'dividends',
  'incentives',
  'consensus',
  'trust',
  'rank',
  'blockAtRegistration',
  'alphaStake',
  'taoStake',
  'totalStake',
] as const;

export const SubnetMetagraphSchema = z
  .object({
    netuid: z.number(),
    name: z.string(),
    symbol: z.string(),
    identity: SubnetIdentitySchema,
    networkRegisteredAt: z.number(),
    ownerHotkey: z.string(),
    ownerColdkey: z.string(),
    block: z.number(),
    tempo: z.number(),
    lastStep: z.number(),
    blocksSinceLastStep: z.number(),
    subnetEmission: z.number(),
    alphaIn: z.number(),
    alphaOut: z.number(),
    taoIn: z.number(),
    alphaOutEmission: z.number(),
    alphaInEmission: z.number(),
    taoInEmission: z.number(),
    pendingAlphaEmission: z.number(),
    pendingRootEmission: z.number(),
    subnetVolume: z.number(),
    movingPrice: z.object({ bits: z.number() }),
    rho: z.number(),
    kappa: z.number(),
    weightsVersion: z.number(),
    weightsRateLimit: RateLimitSchema,
    activityCutoff: z.number(),
    maxValidators: z.number(),
    numUids: z.number().int().nonnegative(),
    maxUids: z.number(),
    burn: z.number(),
    difficulty: HexOrIntSchema,
    registrationAllowed: z.boolean(),
    powRegistrationAllowed: z.boolean(),
    immunityPeriod: z.number(),
    minDifficulty: HexOrIntSchema,
    maxDifficulty: HexOrIntSchema,
    minBurn: z.number(),
    maxBurn: z.number(),
    adjustmentAlpha: HexOrIntSchema,
    adjustmentInterval: z.number(),
    targetRegsPerInterval: z.number(),
    maxRegsPerBlock: z.number(),
    servingRateLimit: z.number(),
    commitRevealWeightsEnabled: z.boolean(),
    commitRevealPeriod: z.number(),
    liquidAlphaEnabled: z.boolean(),
    alphaHigh: z.number(),
    alphaLow: z.number(),
    bondsMovingAvg: z.number(),
    hotkeys: z.array(z.string()),
    coldkeys: z.array(z.string()),
    identities: z.array(IdentitiesInfoSchema.nullable()),
    axons: z.array(AxonInfoSchema),
    active: z.array(z.boolean()),
    validatorPermit: z.array(z.boolean()),
    pruningScore: z.array(z.number()),
    lastUpdate: z.array(z.number()),
    emission: z.array(z.number()),
    dividends: z.array(z.number()),
    incentives: z.array(z.number()),
    consensus: z.array(z.number()),
    trust: z.array(z.number()),
    rank: z.array(z.number()),
    blockAtRegistration: z.array(z.number()),
    alphaStake: z.array(z.number()),
    taoStake: z.array(z.number()),
    totalStake: z.array(z.number()),
    taoDividendsPerHotkey: z.array(DividendPairSchema),
    alphaDividendsPerHotkey: z.array(DividendPairSchema),
  })
  .superRefine((metagraph, ctx) => {
    for (const field of PARTICIPANT_FIELDS) {
      const length = metagraph[field].length;
      if (length !== metagraph.numUids) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `expected ${metagraph.numUids} entries (numUids), got ${length}`,
        });
      }
    }
  });

// --------------------------------------------------------------------------
// Operation Responses
// --------------------------------------------------------------------------

export const LatestBlockSchema = z.object({
  blockNumber: z.union([
    z.number().int().nonnegative(),
    z
      .string()
      .trim()
      .regex(/^\d+$/, 'blockNumber must be an integer')
      .transform((value) => Number.parseInt(value, 10)),
  ]),
});

export const HotkeyCheckSchema = z.object({
  isHotkeyValid: z.boolean().optional(),
});

export const SignMessageSchema = z
  .object({
    signature: z.string().optional(),
    error: z.unknown(),
  })
  .nullish();

export const VerifyMessageSchema = z
  .object({
    valid: z.boolean().optional(),
  })
  .nullish();

export const KeyringPairSchema = z.object({
  hotkey: z.string().min(1),
  coldkey: z.string().min(1),
});

// --------------------------------------------------------------------------
// Validation Helpers
// --------------------------------------------------------------------------

/** Parse `value` or fail with a ProtocolError naming the record */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  record: string
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5).map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ProtocolError(`Chain service returned an invalid ${record}`, { issues });
  }
  return result.data;
}

export function validateEnvelope(value: unknown): ResponseEnvelope {
  return parseRecord(ResponseEnvelopeSchema, value, 'response envelope');
}

export function validateSubnetHyperparameters(value: unknown): SubnetHyperparameters {
  return parseRecord(SubnetHyperparametersSchema, value, 'subnet hyperparameters record');
}

export function validateSubnetMetagraph(value: unknown): SubnetMetagraph {
  return parseRecord(SubnetMetagraphSchema, value, 'subnet metagraph');
}

export function validateKeyringPair(value: unknown): KeyringPair {
  return parseRecord(KeyringPairSchema, value, 'keyring pair');
}
