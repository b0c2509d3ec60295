// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/queries`
 * Purpose: Read-only voting-power and total-supply lookups by time and by block number.
 * Scope: Pure functions over EscrowView. Never mutate state.
 * Invariants:
 * - Results are floored at zero.
 * - Block queries reject blocks after the current block.
 * - Block queries inside the newest interval extrapolate towards the current instant.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#historical-queries
 * @public
 */

import { InvalidStateError } from "./errors";
import type { Address, ChainInstant, Point } from "./model";
import { clampToZero, decay } from "./point";
import { epochBeforeBlock } from "./search";
import type { EscrowView } from "./store";
import { supplyAt } from "./walker";

/** Account voting power at `time`, projected from its latest point */
export function votingPowerAt(
  view: EscrowView,
  account: Address,
  time: bigint
): bigint {
  const epoch = view.userPointEpoch(account);
  if (epoch === 0) {
    return 0n;
  }
  return decay(view.userPointAt(account, epoch), time).bias;
}

export interface BlockTimeEstimate {
  /** Global epoch bracketing the block from below */
  readonly epoch: number;
  readonly point: Point;
  /** Interpolated timestamp of the block */
  readonly timestamp: bigint;
}

/**
 * Interpolate the timestamp of `block` between the two global points that
 * bracket it, or between the latest point and `now` when it lies in the
 * newest interval.
 */
export function estimateBlockTime(
  view: EscrowView,
  block: bigint,
  now: ChainInstant
): BlockTimeEstimate {
  const maxEpoch = view.epoch();
  const epoch = epochBeforeBlock(block, maxEpoch, (i) => view.pointAt(i).blk);
  const point = view.pointAt(epoch);

  let dBlock: bigint;
  let dTime: bigint;
  if (epoch < maxEpoch) {
    const next = view.pointAt(epoch + 1);
    dBlock = next.blk - point.blk;
    dTime = next.ts - point.ts;
  } else {
    dBlock = now.blockNumber - point.blk;
    dTime = now.timestamp - point.ts;
  }

  const timestamp =
    dBlock !== 0n ? point.ts + (dTime * (block - point.blk)) / dBlock : point.ts;

  return { epoch, point, timestamp };
}

function assertNotFutureBlock(block: bigint, now: ChainInstant): void {
  if (block > now.blockNumber) {
    throw new InvalidStateError(
      `Block ${block} is after the current block ${now.blockNumber}`
    );
  }
}

/** Account voting power as of `block` */
export function votingPowerAtBlock(
  view: EscrowView,
  account: Address,
  block: bigint,
  now: ChainInstant
): bigint {
  assertNotFutureBlock(block, now);

  const userEpoch = epochBeforeBlock(
    block,
    view.userPointEpoch(account),
    (i) => view.userPointAt(account, i).blk
  );
  const userPoint = view.userPointAt(account, userEpoch);
  const { timestamp } = estimateBlockTime(view, block, now);

  return clampToZero(userPoint.bias - userPoint.slope * (timestamp - userPoint.ts));
}

/** Total voting power at `time`, replayed from the latest global point */
export function totalSupplyAt(view: EscrowView, time: bigint): bigint {
  return supplyAt(view.pointAt(view.epoch()), time, (t) =>
    view.slopeChangeAt(t)
  );
}

/** Total voting power as of `block` */
export function totalSupplyAtBlock(
  view: EscrowView,
  block: bigint,
  now: ChainInstant
): bigint {
  assertNotFutureBlock(block, now);
  const { point, timestamp } = estimateBlockTime(view, block, now);
  return supplyAt(point, timestamp, (t) => view.slopeChangeAt(t));
}

// ---------------------------------------------------------------------------
// Raw lookups
// ---------------------------------------------------------------------------

export function lockedEnd(view: EscrowView, account: Address): bigint {
  return view.lockOf(account).end;
}

export function lastUserSlope(view: EscrowView, account: Address): bigint {
  return view.userPointAt(account, view.userPointEpoch(account)).slope;
}

export function userPointHistoryTs(
  view: EscrowView,
  account: Address,
  epoch: number
): bigint {
  return view.userPointAt(account, epoch).ts;
}
