// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/model`
 * Purpose: Domain types for locks, decay points and checkpoint plans.
 * Scope: Pure types and frozen empty values. Does not contain business logic or perform I/O.
 * Invariants:
 * - Point represents value(t) = max(0, bias - slope * (t - ts)) for t >= ts.
 * - LockedBalance.end === 0n means no lock (withdrawn or never created).
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

/** Hex account address; normalization happens at the feature boundary */
export type Address = `0x${string}`;

/** Why a lock changed — mirrors the deposit entry points */
export const DEPOSIT_TYPES = [
  "DEPOSIT_FOR",
  "CREATE_LOCK",
  "INCREASE_LOCK_AMOUNT",
  "INCREASE_UNLOCK_TIME",
] as const;
export type DepositType = (typeof DEPOSIT_TYPES)[number];

/** Decay-line sample */
export interface Point {
  readonly bias: bigint;
  readonly slope: bigint;
  readonly ts: bigint;
  readonly blk: bigint;
}

export interface LockedBalance {
  readonly amount: bigint;
  readonly end: bigint;
}

/** Timestamp (seconds) and block number observed together */
export interface ChainInstant {
  readonly timestamp: bigint;
  readonly blockNumber: bigint;
}

/** Account lock transition folded into a checkpoint */
export interface LockChange {
  readonly account: Address;
  readonly oldLock: LockedBalance;
  readonly newLock: LockedBalance;
}

export interface SlopeChangeWrite {
  readonly time: bigint;
  readonly slope: bigint;
}

/** Every write a checkpoint makes, computed from the pre-state */
export interface CheckpointPlan {
  /** Appended in order; the last entry is the new latest global point */
  readonly globalPoints: readonly Point[];
  readonly slopeChanges: readonly SlopeChangeWrite[];
  readonly userPoint: { readonly account: Address; readonly point: Point } | null;
}

/** Admin and allow-list configuration, two-phase (commit then apply) */
export interface EscrowControl {
  readonly admin: Address;
  readonly futureAdmin: Address | null;
  readonly smartWalletChecker: Address | null;
  readonly futureSmartWalletChecker: Address | null;
}

export const EMPTY_POINT: Point = Object.freeze({
  bias: 0n,
  slope: 0n,
  ts: 0n,
  blk: 0n,
});

export const EMPTY_LOCK: LockedBalance = Object.freeze({ amount: 0n, end: 0n });
