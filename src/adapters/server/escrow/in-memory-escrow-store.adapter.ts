// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/escrow/in-memory-escrow-store`
 * Purpose: Process-local EscrowStore with journaled transactions.
 * Scope: Holds global and per-account history, slope schedule, locks, supply and control record in memory. Does not persist across restarts.
 * Invariants:
 * - HISTORY_APPEND_ONLY: points are only pushed; rollback is the only pop.
 * - ATOMIC_TRANSACTION: every write inside transaction() records its inverse; a rejected callback replays them newest-first.
 * - Global epoch 0 is the genesis point; per-account epoch 0 is EMPTY_POINT.
 * Side-effects: none (in-memory only)
 * Links: Implements EscrowStore from @vote-escrow/escrow-core
 * @public
 */

import {
  type Address,
  type ChainInstant,
  EMPTY_LOCK,
  EMPTY_POINT,
  type EscrowControl,
  type EscrowStore,
  type LockedBalance,
  type Point,
} from "@vote-escrow/escrow-core";

export interface InMemoryEscrowStoreOptions {
  /** Instant the escrow was opened; seeds global epoch 0 */
  readonly genesis: ChainInstant;
  readonly admin: Address;
  readonly smartWalletChecker?: Address | null;
}

type Undo = () => void;

export class InMemoryEscrowStore implements EscrowStore {
  private readonly points: Point[];
  private readonly userPoints = new Map<Address, Point[]>();
  private readonly slopeChanges = new Map<bigint, bigint>();
  private readonly locks = new Map<Address, LockedBalance>();
  private supplyValue = 0n;
  private controlValue: EscrowControl;
  private journal: Undo[] | null = null;

  constructor(options: InMemoryEscrowStoreOptions) {
    this.points = [
      {
        bias: 0n,
        slope: 0n,
        ts: options.genesis.timestamp,
        blk: options.genesis.blockNumber,
      },
    ];
    this.controlValue = {
      admin: options.admin,
      futureAdmin: null,
      smartWalletChecker: options.smartWalletChecker ?? null,
      futureSmartWalletChecker: null,
    };
  }

  // ---------------------------------------------------------------------------
  // EscrowView
  // ---------------------------------------------------------------------------

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
    return this.supplyValue;
  }

  control(): EscrowControl {
    return this.controlValue;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  appendPoint(point: Point): void {
    this.points.push(point);
    this.record(() => {
      this.points.pop();
    });
  }

  appendUserPoint(account: Address, point: Point): void {
    let history = this.userPoints.get(account);
    if (!history) {
      history = [EMPTY_POINT];
      this.userPoints.set(account, history);
      this.record(() => {
        this.userPoints.delete(account);
      });
    }
    const target = history;
    target.push(point);
    this.record(() => {
      target.pop();
    });
  }

  setSlopeChange(time: bigint, slope: bigint): void {
    const previous = this.slopeChanges.get(time);
    this.slopeChanges.set(time, slope);
    this.record(() => {
      if (previous === undefined) {
        this.slopeChanges.delete(time);
      } else {
        this.slopeChanges.set(time, previous);
      }
    });
  }

  setLock(account: Address, lock: LockedBalance): void {
    const previous = this.locks.get(account);
    this.locks.set(account, lock);
    this.record(() => {
      if (previous === undefined) {
        this.locks.delete(account);
      } else {
        this.locks.set(account, previous);
      }
    });
  }

  setSupply(supply: bigint): void {
    const previous = this.supplyValue;
    this.supplyValue = supply;
    this.record(() => {
      this.supplyValue = previous;
    });
  }

  setControl(control: EscrowControl): void {
    const previous = this.controlValue;
    this.controlValue = control;
    this.record(() => {
      this.controlValue = previous;
    });
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.journal !== null) {
      throw new Error(
        "[InMemoryEscrowStore] Nested transactions are not supported"
      );
    }

    const journal: Undo[] = [];
    this.journal = journal;
    try {
      const result = await fn();
      this.journal = null;
      return result;
    } catch (error) {
      this.journal = null;
      for (const undo of journal.reverse()) {
        undo();
      }
      throw error;
    }
  }

  private record(undo: Undo): void {
    this.journal?.push(undo);
  }
}
