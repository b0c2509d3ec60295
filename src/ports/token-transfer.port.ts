// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/token-transfer.port`
 * Purpose: Movement of the locked asset between holders and escrow custody.
 * Scope: Interface only. Does not track voting power.
 * Invariants: A `false` result means nothing moved; the caller aborts the whole operation.
 * Side-effects: none (interface only)
 * Links: Implemented by InMemoryTokenVault and FakeTokenTransfer
 * @public
 */

import type { Address } from "@vote-escrow/escrow-core";

export interface TokenTransferPort {
  /** Pull `amount` from `from` into escrow custody */
  transferIn(from: Address, amount: bigint): Promise<boolean>;
  /** Release `amount` from escrow custody to `to` */
  transferOut(to: Address, amount: bigint): Promise<boolean>;
}
