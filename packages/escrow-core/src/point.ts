// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/point`
 * Purpose: Bias/slope arithmetic for a single lock and decay of a point to a later time.
 * Scope: Pure functions. Does not read or write history.
 * Invariants:
 * - slope = amount / MAXTIME with truncating bigint division.
 * - Decayed bias and slope are never negative.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#point-arithmetic
 * @public
 */

import { MAXTIME, WEEK } from "./constants";
import type { Point } from "./model";

/** Bias and slope of a lock's decay line as seen at `now` */
export interface Line {
  readonly bias: bigint;
  readonly slope: bigint;
}

/**
 * Decay line for `amount` locked until `end`, sampled at `now`.
 * Expired or empty locks contribute nothing.
 */
export function lineFor(amount: bigint, end: bigint, now: bigint): Line {
  if (end > now && amount > 0n) {
    const slope = amount / MAXTIME;
    return { bias: slope * (end - now), slope };
  }
  return { bias: 0n, slope: 0n };
}

/**
 * Project `point` to `targetTime` along its own slope.
 * Targets before `point.ts` project backwards; only the floor at zero applies.
 */
export function decay(point: Point, targetTime: bigint): Point {
  const bias = point.bias - point.slope * (targetTime - point.ts);
  return {
    bias: bias > 0n ? bias : 0n,
    slope: point.slope > 0n ? point.slope : 0n,
    ts: targetTime,
    blk: point.blk,
  };
}

/** Round a timestamp down to the start of its week */
export function floorToWeek(time: bigint): bigint {
  return (time / WEEK) * WEEK;
}

export function clampToZero(value: bigint): bigint {
  return value < 0n ? 0n : value;
}
