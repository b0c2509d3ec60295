// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/escrow/services/votingEscrow`
 * Purpose: Orchestrate every vote-escrow entry point over the store, clock, token, wallet-checker and event ports.
 * Scope: Guards, atomic application of lock transitions, event publication, logging, and all read queries. Does not contain decay arithmetic; that lives in escrow-core.
 * Invariants:
 * - Every address argument is checksummed with getAddress before any port sees it.
 * - One mutating lock operation in flight at a time; overlap fails with ReentrantCallError.
 * - The token transfer settles before any write; lock, checkpoint and supply are then applied in one synchronous transaction, so readers never see uncommitted state.
 * - Admin checks run before any other state is read or written.
 * - Events are published only after the store transaction commits.
 * Side-effects: IO (token transfers, wallet-checker reads, logging)
 * Links: docs/VOTING_ESCROW.md
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type Address,
  type ChainInstant,
  type CheckpointPlan,
  type DepositType,
  type EscrowControl,
  InvalidStateError,
  isEscrowError,
  type LockedBalance,
  lastUserSlope,
  lockedEnd,
  type Point,
  planCheckpoint,
  ReentrantCallError,
  resolveCreateLock,
  resolveDepositFor,
  resolveIncreaseAmount,
  resolveIncreaseUnlockTime,
  resolveWithdraw,
  TransferFailedError,
  totalSupplyAt,
  totalSupplyAtBlock,
  UnauthorizedError,
  userPointHistoryTs,
  votingPowerAt,
  votingPowerAtBlock,
} from "@vote-escrow/escrow-core";
import { getAddress, isAddressEqual } from "viem";

import type { EscrowEvent } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type Logger,
} from "@/shared/observability";

import type {
  CallContext,
  EscrowMetadata,
  VotingEscrowDeps,
} from "../types";

interface LockTransition {
  account: Address;
  /** Tokens moved; pulled from `payer` on deposit, paid to `account` on withdraw */
  value: bigint;
  payer: Address;
  depositType: DepositType | null;
  resolve: (lock: LockedBalance, now: bigint) => LockedBalance;
}

export class VotingEscrowService {
  private readonly log: Logger;
  private entered = false;

  constructor(
    private readonly deps: VotingEscrowDeps,
    private readonly meta: EscrowMetadata
  ) {
    this.log = deps.log.child({ component: "VotingEscrowService" });
  }

  // ---------------------------------------------------------------------------
  // Lock operations
  // ---------------------------------------------------------------------------

  /** Add tokens from the caller to their own active lock */
  deposit(ctx: CallContext, value: bigint): Promise<void> {
    return this.guarded("deposit", async () => {
      const caller = await this.admitCaller(ctx, "deposit");
      await this.applyLockTransition("deposit", {
        account: caller,
        value,
        payer: caller,
        depositType: "DEPOSIT_FOR",
        resolve: (lock, now) => resolveDepositFor(lock, value, now),
      });
    });
  }

  /** Add tokens from the caller to `account`'s active lock */
  depositFor(ctx: CallContext, account: Address, value: bigint): Promise<void> {
    return this.guarded("depositFor", () =>
      this.applyLockTransition("depositFor", {
        account: getAddress(account),
        value,
        payer: getAddress(ctx.sender),
        depositType: "DEPOSIT_FOR",
        resolve: (lock, now) => resolveDepositFor(lock, value, now),
      })
    );
  }

  /** Open a lock of `value` tokens until `unlockTime`, rounded down to a whole week */
  createLock(
    ctx: CallContext,
    value: bigint,
    unlockTime: bigint
  ): Promise<void> {
    return this.guarded("createLock", async () => {
      const caller = await this.admitCaller(ctx, "createLock");
      await this.applyLockTransition("createLock", {
        account: caller,
        value,
        payer: caller,
        depositType: "CREATE_LOCK",
        resolve: (lock, now) =>
          resolveCreateLock(lock, value, unlockTime, now),
      });
    });
  }

  increaseAmount(ctx: CallContext, value: bigint): Promise<void> {
    return this.guarded("increaseAmount", async () => {
      const caller = await this.admitCaller(ctx, "increaseAmount");
      await this.applyLockTransition("increaseAmount", {
        account: caller,
        value,
        payer: caller,
        depositType: "INCREASE_LOCK_AMOUNT",
        resolve: (lock, now) => resolveIncreaseAmount(lock, value, now),
      });
    });
  }

  increaseUnlockTime(ctx: CallContext, unlockTime: bigint): Promise<void> {
    return this.guarded("increaseUnlockTime", async () => {
      const caller = await this.admitCaller(ctx, "increaseUnlockTime");
      await this.applyLockTransition("increaseUnlockTime", {
        account: caller,
        value: 0n,
        payer: caller,
        depositType: "INCREASE_UNLOCK_TIME",
        resolve: (lock, now) => resolveIncreaseUnlockTime(lock, unlockTime, now),
      });
    });
  }

  /** Release the whole lock once it has expired */
  withdraw(ctx: CallContext): Promise<void> {
    return this.guarded("withdraw", () => {
      const caller = getAddress(ctx.sender);
      const locked = this.deps.store.lockOf(caller);
      return this.applyLockTransition("withdraw", {
        account: caller,
        value: locked.amount,
        payer: caller,
        depositType: null,
        resolve: (lock, now) => resolveWithdraw(lock, now),
      });
    });
  }

  /** Bring global history up to the current instant */
  checkpoint(): Promise<void> {
    return this.guarded("checkpoint", async () => {
      const opId = randomUUID();
      const { store } = this.deps;
      try {
        const now = await this.deps.clock.current();
        const plan = planCheckpoint(store, now);
        await store.transaction(async () => {
          applyPlan(store, plan);
        });
        logEvent(this.log, EVENT_NAMES.ESCROW_CHECKPOINT, {
          opId,
          epoch: store.epoch(),
          appended: plan.globalPoints.length,
        });
      } catch (error) {
        this.logRejected(opId, "checkpoint", error);
        throw error;
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  commitTransferOwnership(ctx: CallContext, futureAdmin: Address): Promise<void> {
    return this.administer(ctx, "commitTransferOwnership", (control) => {
      const next = getAddress(futureAdmin);
      return {
        control: { ...control, futureAdmin: next },
        event: { type: "CommitOwnership", admin: next },
      };
    });
  }

  applyTransferOwnership(ctx: CallContext): Promise<void> {
    return this.administer(ctx, "applyTransferOwnership", (control) => {
      const next = control.futureAdmin;
      if (next === null) {
        throw new InvalidStateError("Admin not set");
      }
      return {
        control: { ...control, admin: next },
        event: { type: "ApplyOwnership", admin: next },
      };
    });
  }

  commitSmartWalletChecker(ctx: CallContext, checker: Address): Promise<void> {
    return this.administer(ctx, "commitSmartWalletChecker", (control) => {
      const next = getAddress(checker);
      return {
        control: { ...control, futureSmartWalletChecker: next },
        event: { type: "CommitSmartWalletChecker", checker: next },
      };
    });
  }

  /** Activate the committed checker; with nothing committed the checker is cleared */
  applySmartWalletChecker(ctx: CallContext): Promise<void> {
    return this.administer(ctx, "applySmartWalletChecker", (control) => ({
      control: {
        ...control,
        smartWalletChecker: control.futureSmartWalletChecker,
      },
      event: {
        type: "ApplySmartWalletChecker",
        checker: control.futureSmartWalletChecker,
      },
    }));
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Voting power of `account` at `at`, defaulting to the current chain time */
  async votingPower(account: Address, at?: bigint): Promise<bigint> {
    const time = at ?? (await this.deps.clock.current()).timestamp;
    return votingPowerAt(this.deps.store, getAddress(account), time);
  }

  async votingPowerAtBlock(account: Address, block: bigint): Promise<bigint> {
    const now = await this.deps.clock.current();
    return votingPowerAtBlock(this.deps.store, getAddress(account), block, now);
  }

  async totalVotingPower(at?: bigint): Promise<bigint> {
    const time = at ?? (await this.deps.clock.current()).timestamp;
    return totalSupplyAt(this.deps.store, time);
  }

  async totalVotingPowerAtBlock(block: bigint): Promise<bigint> {
    const now = await this.deps.clock.current();
    return totalSupplyAtBlock(this.deps.store, block, now);
  }

  lockedEnd(account: Address): bigint {
    return lockedEnd(this.deps.store, getAddress(account));
  }

  lastUserSlope(account: Address): bigint {
    return lastUserSlope(this.deps.store, getAddress(account));
  }

  userPointHistoryTs(account: Address, epoch: number): bigint {
    return userPointHistoryTs(this.deps.store, getAddress(account), epoch);
  }

  lockedBalance(account: Address): LockedBalance {
    return this.deps.store.lockOf(getAddress(account));
  }

  userPointEpoch(account: Address): number {
    return this.deps.store.userPointEpoch(getAddress(account));
  }

  userPointHistory(account: Address, epoch: number): Point {
    return this.deps.store.userPointAt(getAddress(account), epoch);
  }

  epoch(): number {
    return this.deps.store.epoch();
  }

  pointHistory(epoch: number): Point {
    return this.deps.store.pointAt(epoch);
  }

  slopeChange(time: bigint): bigint {
    return this.deps.store.slopeChangeAt(time);
  }

  supply(): bigint {
    return this.deps.store.supply();
  }

  metadata(): EscrowMetadata {
    return this.meta;
  }

  admin(): Address {
    return this.deps.store.control().admin;
  }

  futureAdmin(): Address | null {
    return this.deps.store.control().futureAdmin;
  }

  smartWalletChecker(): Address | null {
    return this.deps.store.control().smartWalletChecker;
  }

  futureSmartWalletChecker(): Address | null {
    return this.deps.store.control().futureSmartWalletChecker;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async guarded<T>(action: string, fn: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new ReentrantCallError(action);
    }
    this.entered = true;
    try {
      return await fn();
    } finally {
      this.entered = false;
    }
  }

  /**
   * Checksummed sender, once admitted. Contract callers must be approved by
   * the configured smart-wallet checker.
   */
  private async admitCaller(
    ctx: CallContext,
    action: string
  ): Promise<Address> {
    const sender = getAddress(ctx.sender);
    if (isAddressEqual(sender, ctx.origin)) {
      return sender;
    }
    const checker = this.deps.store.control().smartWalletChecker;
    if (
      checker !== null &&
      (await this.deps.walletChecker.isApproved(checker, sender))
    ) {
      return sender;
    }
    const error = new UnauthorizedError(sender, action);
    this.logRejected(randomUUID(), action, error);
    throw error;
  }

  private async applyLockTransition(
    action: string,
    transition: LockTransition
  ): Promise<void> {
    const opId = randomUUID();
    const { store } = this.deps;
    const { account, value, payer, depositType } = transition;

    try {
      const now = await this.deps.clock.current();
      const prevSupply = store.supply();
      const oldLock = store.lockOf(account);
      const newLock = transition.resolve(oldLock, now.timestamp);
      const plan = planCheckpoint(store, now, { account, oldLock, newLock });
      const supply =
        depositType === null ? prevSupply - value : prevSupply + value;

      if (value !== 0n) {
        await this.settle(depositType === null ? "out" : "in", {
          account,
          payer,
          value,
        });
      }

      await store.transaction(async () => {
        store.setLock(account, newLock);
        applyPlan(store, plan);
        store.setSupply(supply);
      });

      this.publishLockEvents(
        now,
        { account, value, depositType, locktime: newLock.end },
        prevSupply,
        supply
      );
      logEvent(this.log, EVENT_NAMES.ESCROW_LOCK_APPLIED, {
        opId,
        action,
        account,
        value: value.toString(),
        lockEnd: newLock.end.toString(),
        supply: supply.toString(),
        epoch: store.epoch(),
      });
    } catch (error) {
      this.logRejected(opId, action, error);
      throw error;
    }
  }

  /** Move tokens for a lock transition; a refused transfer aborts it */
  private async settle(
    direction: "in" | "out",
    movement: { account: Address; payer: Address; value: bigint }
  ): Promise<void> {
    const { token } = this.deps;
    if (direction === "out") {
      if (!(await token.transferOut(movement.account, movement.value))) {
        throw new TransferFailedError("out", movement.account, movement.value);
      }
      return;
    }
    if (!(await token.transferIn(movement.payer, movement.value))) {
      throw new TransferFailedError("in", movement.payer, movement.value);
    }
  }

  private publishLockEvents(
    now: ChainInstant,
    lock: {
      account: Address;
      value: bigint;
      depositType: DepositType | null;
      locktime: bigint;
    },
    prevSupply: bigint,
    supply: bigint
  ): void {
    const { events } = this.deps;
    if (lock.depositType === null) {
      events.publish({
        type: "Withdraw",
        provider: lock.account,
        value: lock.value,
        ts: now.timestamp,
      });
    } else {
      events.publish({
        type: "Deposit",
        provider: lock.account,
        value: lock.value,
        locktime: lock.locktime,
        depositType: lock.depositType,
        ts: now.timestamp,
      });
    }
    events.publish({ type: "Supply", prevSupply, supply });
  }

  private async administer(
    ctx: CallContext,
    action: string,
    change: (control: EscrowControl) => {
      control: EscrowControl;
      event: EscrowEvent;
    }
  ): Promise<void> {
    const opId = randomUUID();
    const { store } = this.deps;
    try {
      const sender = getAddress(ctx.sender);
      const current = store.control();
      if (!isAddressEqual(sender, current.admin)) {
        throw new UnauthorizedError(sender, action);
      }
      const next = change(current);
      await store.transaction(async () => {
        store.setControl(next.control);
      });
      this.deps.events.publish(next.event);
      logEvent(this.log, EVENT_NAMES.ESCROW_CONTROL_CHANGED, {
        opId,
        action,
        admin: next.control.admin,
        futureAdmin: next.control.futureAdmin,
        smartWalletChecker: next.control.smartWalletChecker,
        futureSmartWalletChecker: next.control.futureSmartWalletChecker,
      });
    } catch (error) {
      this.logRejected(opId, action, error);
      throw error;
    }
  }

  private logRejected(opId: string, action: string, error: unknown): void {
    this.log.warn(
      {
        event: EVENT_NAMES.ESCROW_OPERATION_REJECTED,
        opId,
        action,
        code: isEscrowError(error) ? error.code : "UNEXPECTED",
        reason: error instanceof Error ? error.message : String(error),
      },
      EVENT_NAMES.ESCROW_OPERATION_REJECTED
    );
  }
}

function applyPlan(
  store: VotingEscrowDeps["store"],
  plan: CheckpointPlan
): void {
  for (const point of plan.globalPoints) {
    store.appendPoint(point);
  }
  for (const write of plan.slopeChanges) {
    store.setSlopeChange(write.time, write.slope);
  }
  if (plan.userPoint !== null) {
    store.appendUserPoint(plan.userPoint.account, plan.userPoint.point);
  }
}
