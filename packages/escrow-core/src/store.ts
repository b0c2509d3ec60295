// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/store`
 * Purpose: Port interface for vote-escrow state. Read view used by the pure planner and queries; write side used by the feature layer.
 * Scope: Type definitions only. Does not contain implementations or I/O.
 * Invariants:
 * - HISTORY_APPEND_ONLY: global and per-account points are only ever appended.
 * - ATOMIC_TRANSACTION: writes made inside transaction() are all undone when its callback rejects.
 * - Global epoch 0 is seeded at construction; per-account epoch 0 is an empty placeholder.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

import type { Address, EscrowControl, LockedBalance, Point } from "./model";

// ---------------------------------------------------------------------------
// Read side
// ---------------------------------------------------------------------------

export interface EscrowView {
  /** Index of the latest global point */
  epoch(): number;
  /** Global point at `epoch`; EMPTY_POINT past the end */
  pointAt(epoch: number): Point;
  /** Index of the account's latest point; 0 when it never locked */
  userPointEpoch(account: Address): number;
  /** Account point at `epoch`; EMPTY_POINT past the end */
  userPointAt(account: Address, epoch: number): Point;
  /** Scheduled slope delta at `time`; 0n when absent */
  slopeChangeAt(time: bigint): bigint;
  lockOf(account: Address): LockedBalance;
  supply(): bigint;
  control(): EscrowControl;
}

// ---------------------------------------------------------------------------
// Write side
// ---------------------------------------------------------------------------

export interface EscrowStore extends EscrowView {
  appendPoint(point: Point): void;
  appendUserPoint(account: Address, point: Point): void;
  setSlopeChange(time: bigint, slope: bigint): void;
  setLock(account: Address, lock: LockedBalance): void;
  setSupply(supply: bigint): void;
  setControl(control: EscrowControl): void;
  /**
   * Run `fn` as one atomic unit. Nested transactions are not supported.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}
