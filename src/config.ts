// ============================================================================
// @phasemint/engine — Configuration Schemas
// ============================================================================

import { promises as fs } from 'node:fs';
import { ethers } from 'ethers';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 20-byte hex address')
  .refine((value) => ethers.isAddress(value), 'has an invalid checksum')
  .refine((value) => value.toLowerCase() !== ethers.ZeroAddress, 'must not be the zero address')
  .transform((value) => ethers.getAddress(value));

/** Currency amount: bigint, non-negative integer, or decimal string. */
const amountSchema = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, 'must be a non-negative integer string'),
  ])
  .transform((value) => BigInt(value));

const bpsSchema = z.number().int().min(0).max(10_000);

const offsetSchema = z.number().int().nonnegative();

export const bytes32Schema = z.string().regex(/^0x[a-fA-F0-9]{64}$/, 'must be a 32-byte hex string');

// ---------------------------------------------------------------------------
// Drop configuration
// ---------------------------------------------------------------------------

export const collectionSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  maxSupply: z.number().int().positive(),
  firstTokenId: z.number().int().nonnegative().default(1),
});

export const publicMintSchema = z
  .object({
    name: z.string().min(1).default('Public'),
    startOffset: offsetSchema,
    endOffset: offsetSchema,
    price: amountSchema,
    maxPerAddress: z.number().int().positive(),
  })
  .refine((value) => value.startOffset < value.endOffset, {
    message: 'startOffset must be before endOffset',
    path: ['endOffset'],
  });

export const presalePhaseSchema = z
  .object({
    name: z.string().min(1),
    startOffset: offsetSchema,
    endOffset: offsetSchema,
    price: amountSchema,
    maxPerAddress: z.number().int().positive(),
    allowListRoot: bytes32Schema,
  })
  .refine((value) => value.startOffset < value.endOffset, {
    message: 'startOffset must be before endOffset',
    path: ['endOffset'],
  });

export const feeSchema = z.object({
  mintFeePerUnit: amountSchema,
  salesFeeBps: bpsSchema.default(0),
  feeRecipient: addressSchema,
  proceedsRecipient: addressSchema,
});

export const royaltySchema = z.object({
  receiver: addressSchema,
  bps: bpsSchema,
});

export const dropConfigSchema = z.object({
  /** Account that holds the instance's funds. */
  address: addressSchema,
  owner: addressSchema,
  collection: collectionSchema,
  publicMint: publicMintSchema,
  fees: feeSchema,
  royalty: royaltySchema.optional(),
});

export type DropConfigInput = z.input<typeof dropConfigSchema>;
export type DropConfig = z.output<typeof dropConfigSchema>;
export type PresalePhaseInput = z.input<typeof presalePhaseSchema>;
export type PublicMintInput = z.input<typeof publicMintSchema>;
export type RoyaltyInput = z.input<typeof royaltySchema>;

// ---------------------------------------------------------------------------
// Factory configuration
// ---------------------------------------------------------------------------

export const platformDefaultsSchema = z.object({
  feeRecipient: addressSchema,
  mintFeePerUnit: amountSchema,
  salesFeeBps: bpsSchema.default(0),
});

export const factoryConfigSchema = z.object({
  address: addressSchema,
  platformAdmin: addressSchema,
  defaults: platformDefaultsSchema,
});

export type PlatformDefaultsInput = z.input<typeof platformDefaultsSchema>;
export type PlatformDefaults = z.output<typeof platformDefaultsSchema>;
export type FactoryConfigInput = z.input<typeof factoryConfigSchema>;
export type FactoryConfig = z.output<typeof factoryConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate `input` against `schema`.
 *
 * @throws {ConfigError} `InvalidConfig` listing every failing path.
 */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ConfigError('InvalidConfig', `invalid ${label} — ${issues.join('; ')}`, {
      cause: result.error,
      issues,
    });
  }
  return result.data;
}

export function parseDropConfig(input: unknown): DropConfig {
  return parseWith(dropConfigSchema, input, 'drop config');
}

export function parseFactoryConfig(input: unknown): FactoryConfig {
  return parseWith(factoryConfigSchema, input, 'factory config');
}

/**
 * Read and validate a drop configuration from a JSON file. Amounts must be
 * written as decimal strings or integers.
 */
export async function loadDropConfig(filePath: string): Promise<DropConfig> {
  const raw = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      'InvalidConfig',
      `failed to parse ${filePath} as JSON — ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return parseDropConfig(parsed);
}
