// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/walker`
 * Purpose: Week-by-week decay walk over the global point, applying scheduled slope changes.
 * Scope: Pure functions shared by the checkpoint planner (with block back-fill) and the total-supply replay. Does not write history.
 * Invariants:
 * - At most MAX_WALK_STEPS week steps per call.
 * - Slope deltas apply only on exact week boundaries; a step clamped to the target time applies none.
 * - Bias and slope are floored at zero after every planner step.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#global-checkpoint
 * @public
 */

import { MAX_WALK_STEPS, MULTIPLIER, WEEK } from "./constants";
import type { ChainInstant, Point } from "./model";
import { clampToZero, floorToWeek } from "./point";

export type SlopeLookup = (time: bigint) => bigint;

export interface GlobalWalk {
  /** Week-boundary points to persist as they are */
  readonly settled: readonly Point[];
  /** Final point of the walk; not yet persisted */
  readonly last: Point;
  /** False when the step cap stopped the walk short of `now` */
  readonly reachedNow: boolean;
}

/**
 * Advance `from` towards `now` one week boundary at a time.
 *
 * Intermediate points get a block number interpolated from the
 * block-per-second rate between `from` and `now`; the point that lands on
 * `now` takes the real block number.
 */
export function walkGlobal(
  from: Point,
  now: ChainInstant,
  slopeChangeAt: SlopeLookup
): GlobalWalk {
  const blockSlope =
    now.timestamp > from.ts
      ? (MULTIPLIER * (now.blockNumber - from.blk)) / (now.timestamp - from.ts)
      : 0n;

  const settled: Point[] = [];
  let bias = from.bias;
  let slope = from.slope;
  let lastCheckpoint = from.ts;
  let tI = floorToWeek(lastCheckpoint);
  let last = from;

  for (let i = 0; i < MAX_WALK_STEPS; i++) {
    tI += WEEK;
    let dSlope = 0n;
    if (tI > now.timestamp) {
      tI = now.timestamp;
    } else {
      dSlope = slopeChangeAt(tI);
    }

    bias = clampToZero(bias - slope * (tI - lastCheckpoint));
    slope = clampToZero(slope + dSlope);
    lastCheckpoint = tI;

    if (tI === now.timestamp) {
      last = { bias, slope, ts: tI, blk: now.blockNumber };
      return { settled, last, reachedNow: true };
    }

    last = {
      bias,
      slope,
      ts: tI,
      blk: from.blk + (blockSlope * (tI - from.ts)) / MULTIPLIER,
    };
    if (i < MAX_WALK_STEPS - 1) {
      settled.push(last);
    }
  }

  return { settled, last, reachedNow: false };
}

/**
 * Total voting power at time `t`, replayed from `point` without side effects.
 * Past the step cap the replay stops at the last week boundary it reached.
 */
export function supplyAt(
  point: Point,
  t: bigint,
  slopeChangeAt: SlopeLookup
): bigint {
  let bias = point.bias;
  let slope = point.slope;
  let ts = point.ts;
  let tI = floorToWeek(ts);

  for (let i = 0; i < MAX_WALK_STEPS; i++) {
    tI += WEEK;
    let dSlope = 0n;
    if (tI > t) {
      tI = t;
    } else {
      dSlope = slopeChangeAt(tI);
    }
    bias -= slope * (tI - ts);
    if (tI === t) break;
    slope += dSlope;
    ts = tI;
  }

  return clampToZero(bias);
}
