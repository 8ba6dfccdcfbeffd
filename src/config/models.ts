// ================================================================================================
// CONFIGURATION MODELS
// ================================================================================================

import { z } from 'zod';

const decimalString = z.string().regex(/^\d+(\.\d+)?$/, 'expected a non-negative decimal string');

export const OracleConfigSchema = z
  .object({
    observationPeriod: z.number().int().positive(), // seconds per observation bucket
    minTimeElapsed: z.number().int().positive(),
    maxTimeElapsed: z.number().int().positive(),
  })
  .refine((oracle) => oracle.minTimeElapsed <= oracle.maxTimeElapsed, {
    message: 'minTimeElapsed must not exceed maxTimeElapsed',
  });

export const ControllerConfigSchema = z.object({
  owner: z.string().min(1),
  defaultExitFeeRecipient: z.string().min(1),
  defaultSellerPremium: z.number().int().min(1).max(19),
});

// ── Seed universe for the demo process ──

export const UniverseTokenSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  decimals: z.literal(18).default(18), // pool math is 18-decimal fixed point
  priceEth: decimalString, // ETH per whole token
  supply: decimalString, // whole tokens minted to the treasury
});

export const UniverseCategorySchema = z.object({
  name: z.string().min(1),
  tokens: z.array(z.string()).min(1).max(25), // symbols
});

export const UniversePoolSchema = z.object({
  category: z.string(), // category name
  name: z.string(),
  symbol: z.string(),
  indexSize: z.number().int().min(2).max(10),
  initialValueEth: decimalString,
});

export const UniverseSchema = z.object({
  treasury: z.string().min(1),
  tokens: z.array(UniverseTokenSchema).min(2),
  categories: z.array(UniverseCategorySchema),
  pools: z.array(UniversePoolSchema),
});

export const AppConfigSchema = z.object({
  apiServerPort: z.number().int().min(1).max(65535),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  universeFile: z.string(),
  oracle: OracleConfigSchema,
  controller: ControllerConfigSchema,
});

export type OracleConfig = z.infer<typeof OracleConfigSchema>;
export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;
export type UniverseToken = z.infer<typeof UniverseTokenSchema>;
export type UniverseCategory = z.infer<typeof UniverseCategorySchema>;
export type UniversePool = z.infer<typeof UniversePoolSchema>;
export type Universe = z.infer<typeof UniverseSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
