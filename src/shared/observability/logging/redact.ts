// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys.
 * Side-effects: none
 * Notes: RPC URLs often embed provider API keys.
 * Links: Imported by logger module; defines sensitive path patterns.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // RPC endpoints
  "rpcUrl",
  "EVM_RPC_URL",
  "config.EVM_RPC_URL",
  // Wallet/crypto
  "privateKey",
  "mnemonic",
  "seed",
];
