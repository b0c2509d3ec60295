// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vote-escrow/escrow-core/rules`
 * Purpose: Preconditions and resulting lock for each lock entry point.
 * Scope: Pure functions. Throw InvalidStateError on a violated precondition; do not touch history or supply.
 * Invariants:
 * - Requested unlock times are rounded down to whole weeks before any check.
 * - A new expiry lies in (now, now + MAXTIME].
 * - Withdrawal is all-or-nothing and only at or after expiry.
 * Side-effects: none
 * Links: docs/VOTING_ESCROW.md#lock-ledger
 * @public
 */

import { MAXTIME } from "./constants";
import { InvalidStateError } from "./errors";
import { EMPTY_LOCK, type LockedBalance } from "./model";
import { floorToWeek } from "./point";

/**
 * Shared transition: add `value` and, when `unlockTime` is non-zero, move the expiry.
 */
export function depositInto(
  lock: LockedBalance,
  value: bigint,
  unlockTime: bigint
): LockedBalance {
  return {
    amount: lock.amount + value,
    end: unlockTime !== 0n ? unlockTime : lock.end,
  };
}

function requirePositive(value: bigint): void {
  if (value <= 0n) {
    throw new InvalidStateError("Value must be greater than zero");
  }
}

function requireActiveLock(lock: LockedBalance, now: bigint): void {
  if (lock.amount <= 0n) {
    throw new InvalidStateError("No existing lock found");
  }
  if (lock.end <= now) {
    throw new InvalidStateError("Cannot add to expired lock. Withdraw");
  }
}

function requireWithinMaxTime(unlockTime: bigint, now: bigint): void {
  if (unlockTime > now + MAXTIME) {
    throw new InvalidStateError("Voting lock can be 4 years max");
  }
}

/** Top up an active lock; never creates one */
export function resolveDepositFor(
  lock: LockedBalance,
  value: bigint,
  now: bigint
): LockedBalance {
  requirePositive(value);
  requireActiveLock(lock, now);
  return depositInto(lock, value, 0n);
}

export function resolveCreateLock(
  lock: LockedBalance,
  value: bigint,
  unlockTime: bigint,
  now: bigint
): LockedBalance {
  const end = floorToWeek(unlockTime);
  requirePositive(value);
  if (lock.amount !== 0n) {
    throw new InvalidStateError("Withdraw old tokens first");
  }
  if (end <= now) {
    throw new InvalidStateError("Can only lock until time in the future");
  }
  requireWithinMaxTime(end, now);
  return depositInto(lock, value, end);
}

export function resolveIncreaseAmount(
  lock: LockedBalance,
  value: bigint,
  now: bigint
): LockedBalance {
  requirePositive(value);
  requireActiveLock(lock, now);
  return depositInto(lock, value, 0n);
}

export function resolveIncreaseUnlockTime(
  lock: LockedBalance,
  unlockTime: bigint,
  now: bigint
): LockedBalance {
  const end = floorToWeek(unlockTime);
  if (lock.end <= now) {
    throw new InvalidStateError("Lock expired");
  }
  if (lock.amount <= 0n) {
    throw new InvalidStateError("Nothing is locked");
  }
  if (end <= lock.end) {
    throw new InvalidStateError("Can only increase lock duration");
  }
  requireWithinMaxTime(end, now);
  return depositInto(lock, 0n, end);
}

export function resolveWithdraw(
  lock: LockedBalance,
  now: bigint
): LockedBalance {
  if (now < lock.end) {
    throw new InvalidStateError("The lock didn't expire");
  }
  return EMPTY_LOCK;
}
