/**
 * @ubistream/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { parseUnits } from "@ubistream/accrual";
import type { EngineConfig } from "@ubistream/delegation";
import { isAddress, normalizeAddress } from "@ubistream/types";
import type { Address } from "@ubistream/types";
import { isRole } from "./types/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AddressEnv = z
  .string()
  .trim()
  .refine(isAddress, { message: "Expected a 0x-prefixed 20-byte hex address" })
  .transform(normalizeAddress);

const DecimalAmountEnv = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal amount");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Token
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  ACCRUED_PER_SECOND: DecimalAmountEnv.default("0.01"),
  INITIAL_SUPPLY: DecimalAmountEnv.default("0"),

  // Engine
  MAX_DELEGATIONS_ALLOWED: z.coerce.number().int().min(1).default(10),
  GOVERNOR_ADDRESS: AddressEnv,
  ENGINE_ADDRESS: AddressEnv.optional(),

  // Registry seed
  VERIFIED_ADDRESSES: z.string().default(""),

  // Auth
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Verified Address Parsing
// =============================================================================

/**
 * Parse the VERIFIED_ADDRESSES env var into normalized addresses.
 *
 * Format: "0xabc...,0xdef..."
 */
export function parseVerifiedAddresses(raw: string): readonly Address[] {
  if (raw.trim() === "") {
    return [];
  }

  const addresses: Address[] = [];
  for (const entry of raw.split(",")) {
    const candidate = entry.trim();
    if (!isAddress(candidate)) {
      throw new Error(`Invalid VERIFIED_ADDRESSES entry: "${candidate}"`);
    }
    addresses.push(normalizeAddress(candidate));
  }

  return [...new Set(addresses)];
}

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into key records.
 *
 * Format: "key1:operator:0xabc...,key2:viewer:0xdef..."
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, address] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: operator or viewer`);
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, role, address: normalizeAddress(address) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Convert token-denominated settings into the engine's base units.
 */
export function toEngineConfig(config: AppConfig): EngineConfig {
  return {
    accruedPerSecond: parseUnits(config.ACCRUED_PER_SECOND, config.TOKEN_DECIMALS),
    maxDelegationsAllowed: config.MAX_DELEGATIONS_ALLOWED,
    governor: config.GOVERNOR_ADDRESS,
    initialSupply: parseUnits(config.INITIAL_SUPPLY, config.TOKEN_DECIMALS),
    ...(config.ENGINE_ADDRESS !== undefined
      ? { engineAddress: config.ENGINE_ADDRESS }
      : {}),
  };
}
