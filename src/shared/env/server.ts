// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the escrow service; provides lazy environment access. Does not read any other config source.
 * Invariants: All required env vars validated on first access; addresses are checksummed; EVM_RPC_URL required when APP_ENV=production; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring; SERVICE_NAME for observability. Lazy init prevents import-time access.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { getAddress, isAddress } from "viem";
import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const addressSchema = z
  .string()
  .refine((value) => isAddress(value), "must be a 0x-prefixed 20-byte address")
  .transform((value) => getAddress(value));

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("vote-escrow"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Escrow metadata
  ESCROW_NAME: z.string().min(1).default("Vote-escrowed Token"),
  ESCROW_SYMBOL: z.string().min(1).default("veTOKEN"),
  ESCROW_VERSION: z.string().min(1).default("1.0.0"),
  ESCROW_TOKEN_DECIMALS: z.coerce.number().int().min(0).max(255).default(18),

  // Governance
  ESCROW_ADMIN_ADDRESS: addressSchema,
  SMART_WALLET_CHECKER_ADDRESS: addressSchema.optional(),

  // Chain access (required outside test mode)
  EVM_RPC_URL: z.string().url().optional(),
});

export type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      const isTestMode = parsed.APP_ENV === "test";

      // Fake adapters must never back a production process
      if (isTestMode && parsed.NODE_ENV === "production") {
        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [],
          invalid: ["APP_ENV"],
        });
      }

      if (!isTestMode && !parsed.EVM_RPC_URL) {
        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: ["EVM_RPC_URL"],
          invalid: [],
        });
      }

      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode,
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Absent vars surface as invalid_type
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }
      throw error;
    }
  }
  return ENV;
}

/** Drop the cached env. For tests that rewrite process.env. */
export function resetServerEnv(): void {
  ENV = null;
}
