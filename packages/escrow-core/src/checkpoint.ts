// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/checkpoint`
 * Purpose: Plan every write of a checkpoint: global catch-up, account fold, slope schedule and account history.
 * Scope: Pure function over EscrowView. Does not write; the caller applies the plan inside a store transaction.
 * Invariants:
 * - Plan is computed from the pre-state only.
 * - Global points in the plan have non-decreasing ts and blk.
 * - A bare checkpoint at the latest point's instant plans nothing.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#global-checkpoint
 * @public
 */

import type {
  ChainInstant,
  CheckpointPlan,
  LockChange,
  Point,
  SlopeChangeWrite,
} from "./model";
import { clampToZero, type Line, lineFor } from "./point";
import type { EscrowView } from "./store";
import { walkGlobal } from "./walker";

const NO_LINE: Line = { bias: 0n, slope: 0n };

const EMPTY_PLAN: CheckpointPlan = {
  globalPoints: [],
  slopeChanges: [],
  userPoint: null,
};

/**
 * Compute the checkpoint for `now`, optionally folding in one account's
 * lock transition.
 */
export function planCheckpoint(
  view: EscrowView,
  now: ChainInstant,
  change: LockChange | null = null
): CheckpointPlan {
  const latest = view.pointAt(view.epoch());
  if (
    change === null &&
    latest.ts === now.timestamp &&
    latest.blk === now.blockNumber
  ) {
    return EMPTY_PLAN;
  }

  let userOld = NO_LINE;
  let userNew = NO_LINE;
  let oldDslope = 0n;
  let newDslope = 0n;

  if (change !== null) {
    const { oldLock, newLock } = change;
    userOld = lineFor(oldLock.amount, oldLock.end, now.timestamp);
    userNew = lineFor(newLock.amount, newLock.end, now.timestamp);

    // Read both schedule entries before anything is rewritten
    oldDslope = view.slopeChangeAt(oldLock.end);
    if (newLock.end !== 0n) {
      newDslope =
        newLock.end === oldLock.end
          ? oldDslope
          : view.slopeChangeAt(newLock.end);
    }
  }

  const walk = walkGlobal(latest, now, (t) => view.slopeChangeAt(t));

  let last: Point = walk.last;
  if (change !== null) {
    last = {
      ...last,
      slope: clampToZero(last.slope + (userNew.slope - userOld.slope)),
      bias: clampToZero(last.bias + (userNew.bias - userOld.bias)),
    };
  }

  const globalPoints = [...walk.settled, last];
  if (change === null) {
    return { globalPoints, slopeChanges: [], userPoint: null };
  }

  const { account, oldLock, newLock } = change;
  const slopeChanges: SlopeChangeWrite[] = [];

  if (oldLock.end > now.timestamp) {
    // Old expiry no longer removes the old slope
    oldDslope += userOld.slope;
    if (newLock.end === oldLock.end) {
      oldDslope -= userNew.slope;
    }
    slopeChanges.push({ time: oldLock.end, slope: oldDslope });
  }

  if (newLock.end > now.timestamp && newLock.end > oldLock.end) {
    newDslope -= userNew.slope;
    slopeChanges.push({ time: newLock.end, slope: newDslope });
  }

  return {
    globalPoints,
    slopeChanges,
    userPoint: {
      account,
      point: {
        bias: userNew.bias,
        slope: userNew.slope,
        ts: now.timestamp,
        blk: now.blockNumber,
      },
    },
  };
}
