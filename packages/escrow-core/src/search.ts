// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/search`
 * Purpose: Bounded binary search over an epoch-indexed log by block number.
 * Scope: Generic over a block accessor; knows nothing about decay.
 * Invariants: Requires blockAt to be non-decreasing over [0, maxEpoch]; at most MAX_SEARCH_ITERATIONS halvings.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#historical-queries
 * @public
 */

import { MAX_SEARCH_ITERATIONS } from "./constants";

/**
 * Greatest epoch in [0, maxEpoch] whose block is <= targetBlock.
 * Returns 0 when no entry qualifies; callers treat entry 0 as the floor.
 */
export function epochBeforeBlock(
  targetBlock: bigint,
  maxEpoch: number,
  blockAt: (epoch: number) => bigint
): number {
  let min = 0;
  let max = maxEpoch;
  for (let i = 0; i < MAX_SEARCH_ITERATIONS; i++) {
    if (min >= max) break;
    const mid = Math.floor((min + max + 1) / 2);
    if (blockAt(mid) <= targetBlock) {
      min = mid;
    } else {
      max = mid - 1;
    }
  }
  return min;
}
