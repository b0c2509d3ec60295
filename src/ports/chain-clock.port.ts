// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/chain-clock.port`
 * Purpose: Current timestamp and block number as observed by the ledger.
 * Scope: Interface only. Does not convert between blocks and times.
 * Invariants: Timestamp and block number are each non-decreasing across calls.
 * Side-effects: none (interface only)
 * Notes: Block numbers must track time closely enough for linear interpolation.
 * Links: Implemented by ViemChainClock and FakeChainClock
 * @public
 */

import type { ChainInstant } from "@vote-escrow/escrow-core";

export type { ChainInstant } from "@vote-escrow/escrow-core";

export interface ChainClock {
  /** Timestamp (seconds) and block number read together */
  current(): Promise<ChainInstant>;
}
