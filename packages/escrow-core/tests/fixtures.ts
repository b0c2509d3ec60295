// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/tests/fixtures`
 * Purpose: Minimal mutable EscrowView for exercising the planner and queries without adapters.
 * Scope: Test-only. Applies plans and lock changes directly; no transactions.
 * Invariants: Mirrors the store port contract (global epoch 0 seeded, account epoch 0 empty).
 * Side-effects: none
 * Links: packages/escrow-core/src/store.ts
 * @internal
 */

import type {
  Address,
  ChainInstant,
  CheckpointPlan,
  EscrowControl,
  EscrowView,
  LockedBalance,
  Point,
} from "../src";
import { EMPTY_LOCK, EMPTY_POINT, planCheckpoint, WEEK } from "../src";

/** 2024-01-04T00:00:00Z, on a week boundary */
export const GENESIS: ChainInstant = {
  timestamp: 1_704_326_400n,
  blockNumber: 1_000_000n,
};

export const ALICE: Address = "0x0000000000000000000000000000000000000001";
export const BOB: Address = "0x0000000000000000000000000000000000000002";
export const ADMIN: Address = "0x0000000000000000000000000000000000000100";

/** `weeks` after genesis, with one block every 12 seconds */
export function at(weeks: bigint, extraSeconds = 0n): ChainInstant {
  const elapsed = weeks * WEEK + extraSeconds;
  return {
    timestamp: GENESIS.timestamp + elapsed,
    blockNumber: GENESIS.blockNumber + elapsed / 12n,
  };
}

export class TestView implements EscrowView {
  readonly points: Point[];
  readonly userPoints = new Map<Address, Point[]>();
  readonly slopeChanges = new Map<bigint, bigint>();
  readonly locks = new Map<Address, LockedBalance>();
  private readonly controlValue: EscrowControl = {
    admin: ADMIN,
    futureAdmin: null,
    smartWalletChecker: null,
    futureSmartWalletChecker: null,
  };

  constructor(genesis: ChainInstant = GENESIS) {
    this.points = [
      { bias: 0n, slope: 0n, ts: genesis.timestamp, blk: genesis.blockNumber },
    ];
  }

  epoch(): number {
    return this.points.length - 1;
  }

  pointAt(epoch: number): Point {
    return this.points[epoch] ?? EMPTY_POINT;
  }

  userPointEpoch(account: Address): number {
    const history = this.userPoints.get(account);
    return history ? history.length - 1 : 0;
  }

  userPointAt(account: Address, epoch: number): Point {
    return this.userPoints.get(account)?.[epoch] ?? EMPTY_POINT;
  }

  slopeChangeAt(time: bigint): bigint {
    return this.slopeChanges.get(time) ?? 0n;
  }

  lockOf(account: Address): LockedBalance {
    return this.locks.get(account) ?? EMPTY_LOCK;
  }

  supply(): bigint {
    return 0n;
  }

  control(): EscrowControl {
    return this.controlValue;
  }

  apply(plan: CheckpointPlan): void {
    this.points.push(...plan.globalPoints);
    for (const write of plan.slopeChanges) {
      this.slopeChanges.set(write.time, write.slope);
    }
    if (plan.userPoint) {
      const history = this.userPoints.get(plan.userPoint.account) ?? [
        EMPTY_POINT,
      ];
      history.push(plan.userPoint.point);
      this.userPoints.set(plan.userPoint.account, history);
    }
  }

  /** Replace `account`'s lock at `now` and apply the resulting checkpoint */
  relock(account: Address, newLock: LockedBalance, now: ChainInstant): void {
    const oldLock = this.lockOf(account);
    this.locks.set(account, newLock);
    this.apply(planCheckpoint(this, now, { account, oldLock, newLock }));
  }
}
