// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/wallet-checker.port`
 * Purpose: Allow-list lookup for contract callers that want to hold a lock.
 * Scope: Interface only. Consulted only when the caller is not the signing origin.
 * Invariants: Read-only.
 * Side-effects: none (interface only)
 * Links: Implemented by ViemSmartWalletChecker and FakeWalletChecker
 * @public
 */

import type { Address } from "@vote-escrow/escrow-core";

export interface WalletCheckerPort {
  /** Whether the checker deployed at `checker` approves `account` */
  isApproved(checker: Address, account: Address): Promise<boolean>;
}
