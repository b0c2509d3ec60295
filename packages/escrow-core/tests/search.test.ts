// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/tests/search`
 * Purpose: Unit tests for the bounded block-number binary search.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Returns the greatest epoch whose block is <= target, or 0.
 * Side-effects: none
 * Links: packages/escrow-core/src/search.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import { epochBeforeBlock } from "../src";

const blocks = [10n, 20n, 20n, 30n, 45n];
const blockAt = (epoch: number): bigint => blocks[epoch] ?? 0n;

describe("epochBeforeBlock", () => {
  it("finds the last epoch at or before the target", () => {
    expect(epochBeforeBlock(25n, 4, blockAt)).toBe(2);
    expect(epochBeforeBlock(30n, 4, blockAt)).toBe(3);
  });

  it("prefers the later of equal block numbers", () => {
    expect(epochBeforeBlock(20n, 4, blockAt)).toBe(2);
  });

  it("returns the last epoch for targets past the end", () => {
    expect(epochBeforeBlock(1_000n, 4, blockAt)).toBe(4);
  });

  it("returns 0 for targets before every entry", () => {
    expect(epochBeforeBlock(5n, 4, blockAt)).toBe(0);
  });

  it("respects maxEpoch as the upper bound", () => {
    expect(epochBeforeBlock(1_000n, 2, blockAt)).toBe(2);
    expect(epochBeforeBlock(1_000n, 0, blockAt)).toBe(0);
  });

  it("reads only O(log n) entries", () => {
    const lookup = vi.fn((epoch: number) => BigInt(epoch));
    expect(epochBeforeBlock(500_000n, 1_000_000, lookup)).toBe(500_000);
    expect(lookup.mock.calls.length).toBeLessThanOrEqual(21);
  });
});
