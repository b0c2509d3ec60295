// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/tests/walker`
 * Purpose: Unit tests for the week-by-week global decay walk and the side-effect-free supply replay.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Slope deltas apply only on week boundaries; walk capped at MAX_WALK_STEPS.
 * Side-effects: none
 * Links: packages/escrow-core/src/walker.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { MAX_WALK_STEPS, type Point, supplyAt, WEEK, walkGlobal } from "../src";

const schedule = new Map<bigint, bigint>([[102n * WEEK, -4n]]);
const slopeChangeAt = (time: bigint): bigint => schedule.get(time) ?? 0n;

const from: Point = { bias: 40n * WEEK, slope: 10n, ts: 100n * WEEK, blk: 1_000n };
const now = { timestamp: 102n * WEEK + 86_400n, blockNumber: 109_000n };

describe("walkGlobal", () => {
  it("settles each crossed week boundary and lands on now", () => {
    const walk = walkGlobal(from, now, slopeChangeAt);

    expect(walk.settled).toEqual([
      { bias: 18_144_000n, slope: 10n, ts: 101n * WEEK, blk: 51_399n },
      { bias: 12_096_000n, slope: 6n, ts: 102n * WEEK, blk: 101_799n },
    ]);
    expect(walk.last).toEqual({
      bias: 11_577_600n,
      slope: 6n,
      ts: now.timestamp,
      blk: now.blockNumber,
    });
    expect(walk.reachedNow).toBe(true);
  });

  it("takes the real block number when now equals the last point", () => {
    const walk = walkGlobal(from, { timestamp: from.ts, blockNumber: 1_005n }, slopeChangeAt);

    expect(walk.settled).toEqual([]);
    expect(walk.last).toEqual({ ...from, blk: 1_005n });
  });

  it("floors bias and slope at zero", () => {
    const walk = walkGlobal(
      { bias: 5n, slope: 3n, ts: 100n * WEEK, blk: 0n },
      { timestamp: 101n * WEEK, blockNumber: 100n },
      () => -10n
    );

    expect(walk.last).toEqual({
      bias: 0n,
      slope: 0n,
      ts: 101n * WEEK,
      blk: 100n,
    });
  });

  it("stops after MAX_WALK_STEPS and leaves the last step unsettled", () => {
    const start: Point = { bias: 0n, slope: 0n, ts: 10n * WEEK, blk: 0n };
    const walk = walkGlobal(
      start,
      { timestamp: 310n * WEEK, blockNumber: 300n * WEEK },
      () => 0n
    );

    expect(walk.reachedNow).toBe(false);
    expect(walk.settled).toHaveLength(MAX_WALK_STEPS - 1);
    expect(walk.settled.at(-1)?.ts).toBe(264n * WEEK);
    expect(walk.last.ts).toBe(265n * WEEK);
  });
});

describe("supplyAt", () => {
  it("replays decay with scheduled slope changes", () => {
    expect(supplyAt(from, now.timestamp, slopeChangeAt)).toBe(11_577_600n);
  });

  it("matches the planner walk at every settled boundary", () => {
    expect(supplyAt(from, 101n * WEEK, slopeChangeAt)).toBe(18_144_000n);
    expect(supplyAt(from, 102n * WEEK, slopeChangeAt)).toBe(12_096_000n);
  });

  it("projects backwards before the point", () => {
    expect(supplyAt(from, 100n * WEEK - 100n, slopeChangeAt)).toBe(24_193_000n);
  });

  it("is zero once every lock has expired", () => {
    const ending: Point = { bias: 40n * WEEK, slope: 10n, ts: 100n * WEEK, blk: 0n };
    const expiry = new Map<bigint, bigint>([[104n * WEEK, -10n]]);
    expect(supplyAt(ending, 104n * WEEK, (t) => expiry.get(t) ?? 0n)).toBe(0n);
    expect(supplyAt(ending, 110n * WEEK, (t) => expiry.get(t) ?? 0n)).toBe(0n);
  });
});
